import { useState } from 'react'
import type { FormEvent } from 'react'

export const DEFAULT_HOME_URL = 'http://www.example.com'

export function BrowserApp() {
  const [address, setAddress] = useState(DEFAULT_HOME_URL)
  const [currentUrl, setCurrentUrl] = useState(DEFAULT_HOME_URL)

  const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault()
    const next = address.trim()
    if (next.length > 0) {
      setCurrentUrl(next)
    }
  }

  return (
    <div className="browser">
      <form className="browser__toolbar" onSubmit={handleSubmit}>
        <input
          className="browser__address"
          aria-label="Address"
          value={address}
          onChange={(event) => setAddress(event.target.value)}
        />
        <button type="submit" className="retro-button">
          Go
        </button>
      </form>
      <div className="browser__content" data-testid="browser-content">
        <p>(Web Content Placeholder)</p>
        <p className="browser__url">{currentUrl}</p>
      </div>
    </div>
  )
}
