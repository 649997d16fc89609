/**
 * Application Entry Point - Dialtone desktop
 */

import { StrictMode } from 'react'
import { createRoot } from 'react-dom/client'
import { App } from './app/App'
import { AppErrorBoundary } from './app/AppErrorBoundary'

import './styles/theme.css'

function bootstrap() {
  const rootElement = document.getElementById('root')
  if (!rootElement) {
    throw new Error('Failed to find root element')
  }

  createRoot(rootElement).render(
    <StrictMode>
      <AppErrorBoundary>
        <App />
      </AppErrorBoundary>
    </StrictMode>
  )
}

try {
  bootstrap()
} catch (error) {
  console.error('Failed to bootstrap application:', error)

  const rootElement = document.getElementById('root')
  if (rootElement) {
    const message = document.createElement('div')
    message.className = 'boot-failure'
    message.textContent = `The desktop failed to start: ${error instanceof Error ? error.message : 'Unknown error occurred'}`
    rootElement.replaceChildren(message)
  }
}
