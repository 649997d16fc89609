import { Battery, LogOut, Wifi } from 'lucide-react'
import { SYSTEM_NAME } from '@/app/version'
import { useClock } from '@/hooks/useClock'

export interface TopBarProps {
  screenName: string
  onSignOff: () => void
}

export function TopBar({ screenName, onSignOff }: TopBarProps) {
  const now = useClock()

  return (
    <header className="top-bar">
      <div className="top-bar__title">{SYSTEM_NAME} SYSTEM</div>
      <div className="top-bar__status">
        <span className="top-bar__user">{screenName}</span>
        <span className="top-bar__item">
          <Wifi size={14} aria-hidden="true" />
          <span>Connected</span>
        </span>
        <span className="top-bar__item">
          <Battery size={14} aria-hidden="true" />
          <span>100%</span>
        </span>
        <time className="top-bar__clock" dateTime={now.toISOString()}>
          {now.toLocaleTimeString()}
        </time>
        <button type="button" className="top-bar__signoff" onClick={onSignOff}>
          <LogOut size={14} aria-hidden="true" />
          Sign Off
        </button>
      </div>
    </header>
  )
}
