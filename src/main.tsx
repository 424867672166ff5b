import { StrictMode, Component } from 'react'
import type { ErrorInfo, ReactNode } from 'react'
import { createRoot } from 'react-dom/client'
import './index.css'
import App from './App.tsx'
import { createLogger } from './verdict/logger'

const logger = createLogger('App')

function showFatal(message: string) {
  const root = document.getElementById('root')
  if (!root) return
  const pre = document.createElement('pre')
  pre.style.cssText = 'padding:16px;white-space:pre-wrap'
  pre.textContent = message
  root.replaceChildren(pre)
}

window.addEventListener('error', (e) => showFatal(String(e.error || e.message)))
window.addEventListener('unhandledrejection', (e) => showFatal(String(e.reason)))

interface ErrorBoundaryState { error: Error | null }

class ErrorBoundary extends Component<{ children: ReactNode }, ErrorBoundaryState> {
  state: ErrorBoundaryState = { error: null }
  static getDerivedStateFromError(error: Error) { return { error } }
  componentDidCatch(error: Error, info: ErrorInfo) {
    logger.error(error.message, { componentStack: info.componentStack })
  }
  render() {
    if (this.state.error) {
      return (
        <div className="error-boundary">
          <h2>Something went wrong</h2>
          <p>The assessment hit an unexpected error. Your last saved scorecard is kept; reload the page to try again.</p>
          <button className="cta-btn" onClick={() => window.location.reload()}>Reload</button>
          <details>
            <summary>Error details</summary>
            <pre>{this.state.error.message}</pre>
          </details>
        </div>
      )
    }
    return this.props.children
  }
}

const rootElement = document.getElementById('root')
if (!rootElement) throw new Error('Missing #root element')

createRoot(rootElement).render(
  <StrictMode>
    <ErrorBoundary>
      <App />
    </ErrorBoundary>
  </StrictMode>,
)
