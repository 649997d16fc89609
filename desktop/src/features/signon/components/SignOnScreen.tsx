/**
 * Sign On dialog shown until the dial-up sequence completes.
 */

import { useState } from 'react'
import type { ChangeEvent } from 'react'
import { Lock, User } from 'lucide-react'
import { APP_VERSION, SYSTEM_NAME } from '@/app/version'
import { useScreenName, useSignOnState, useSignOnStore } from '../signOnStore'
import { SCREEN_NAMES } from '../machine/types'
import type { ScreenName } from '../machine/types'

function isScreenName(value: string): value is ScreenName {
  return SCREEN_NAMES.some((name) => name === value)
}

export const HELP_TEXT =
  'Choose a screen name and press SIGN ON. The modem dials, verifies your password and opens your desktop.'

export function SignOnScreen() {
  const state = useSignOnState()
  const statusText = useSignOnStore((store) => store.statusText)
  const canSignOn = useSignOnStore((store) => store.canSignOn)
  const signOn = useSignOnStore((store) => store.signOn)
  const lastScreenName = useScreenName()
  const [screenName, setScreenName] = useState<ScreenName>(lastScreenName)
  const [showHelp, setShowHelp] = useState(false)

  const handleScreenNameChange = (event: ChangeEvent<HTMLSelectElement>) => {
    if (isScreenName(event.target.value)) {
      setScreenName(event.target.value)
    }
  }

  return (
    <div className="signon">
      <div className="signon__dialog" role="dialog" aria-labelledby="signon-title">
        <div className="signon__titlebar">
          <span id="signon-title">Sign On</span>
        </div>

        <div className="signon__body">
          <div className="signon__row">
            <div className="signon__logo" aria-hidden="true">
              {SYSTEM_NAME.charAt(0)}
            </div>
            <div className="signon__fields">
              <label className="signon__label" htmlFor="signon-screen-name">
                Screen Name
              </label>
              <div className="signon__field">
                <User size={16} aria-hidden="true" />
                <select
                  id="signon-screen-name"
                  value={screenName}
                  onChange={handleScreenNameChange}
                  disabled={!canSignOn}
                >
                  {SCREEN_NAMES.map((name) => (
                    <option key={name} value={name}>
                      {name}
                    </option>
                  ))}
                </select>
              </div>

              <label className="signon__label" htmlFor="signon-password">
                Password
              </label>
              <div className="signon__field">
                <Lock size={16} aria-hidden="true" />
                <input id="signon-password" type="password" defaultValue="password" disabled={!canSignOn} />
              </div>
            </div>
          </div>

          <div className={`signon__status signon__status--${state}`} role="status">
            {statusText}
          </div>

          {showHelp && <p className="signon__help">{HELP_TEXT}</p>}

          <div className="signon__footer">
            <div className="signon__links">
              <button type="button" className="link-button" aria-expanded={showHelp} onClick={() => setShowHelp((open) => !open)}>
                Help
              </button>
              <span className="signon__version">Version {APP_VERSION}</span>
            </div>
            <button type="button" className="retro-button retro-button--primary" onClick={() => signOn(screenName)} disabled={!canSignOn}>
              SIGN ON
            </button>
          </div>
        </div>
      </div>
    </div>
  )
}
