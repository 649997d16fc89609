import { Component } from 'react'
import type { ErrorInfo, ReactNode } from 'react'
import { AlertTriangle } from 'lucide-react'
import { SYSTEM_NAME } from './version'

export const CRASH_MESSAGE = 'This program has performed an illegal operation and will be shut down.'

function CrashDialog({ error, onRestart }: { error: Error | null; onRestart: () => void }) {
  return (
    <div className="crash">
      <div className="crash__dialog" role="alertdialog" aria-labelledby="crash-title" aria-describedby="crash-message">
        <div className="crash__titlebar">
          <span id="crash-title">{SYSTEM_NAME} System Error</span>
        </div>
        <div className="crash__body">
          <AlertTriangle size={32} aria-hidden="true" className="crash__icon" />
          <div>
            <p id="crash-message">{CRASH_MESSAGE}</p>
            {error && <pre className="crash__details">{error.message}</pre>}
          </div>
        </div>
        <div className="crash__footer">
          <button type="button" className="retro-button retro-button--primary" onClick={onRestart}>
            Restart
          </button>
        </div>
      </div>
    </div>
  )
}

interface AppErrorBoundaryState {
  error: Error | null
}

/** Shows a crash dialog in place of any subtree that throws while rendering. */
export class AppErrorBoundary extends Component<{ children: ReactNode }, AppErrorBoundaryState> {
  override state: AppErrorBoundaryState = { error: null }

  static getDerivedStateFromError(error: Error): AppErrorBoundaryState {
    return { error }
  }

  override componentDidCatch(error: Error, errorInfo: ErrorInfo) {
    console.error('Desktop crashed:', error, errorInfo.componentStack)
  }

  override render() {
    if (this.state.error) {
      return <CrashDialog error={this.state.error} onRestart={() => this.setState({ error: null })} />
    }

    return this.props.children
  }
}
