import { Component, type ErrorInfo, type ReactNode } from 'react'

interface Props {
  children: ReactNode
  fallback?: ReactNode
}

interface State {
  error: Error | null
  componentStack: string | null
}

export class ErrorBoundary extends Component<Props, State> {
  state: State = { error: null, componentStack: null }

  static getDerivedStateFromError(error: Error): Partial<State> {
    return { error }
  }

  componentDidCatch(error: Error, errorInfo: ErrorInfo) {
    console.error('[ui] Render failed:', error, errorInfo)
    this.setState({ componentStack: errorInfo.componentStack ?? null })
  }

  handleReset = () => {
    this.setState({ error: null, componentStack: null })
  }

  render() {
    const { error, componentStack } = this.state
    if (!error) {
      return this.props.children
    }
    if (this.props.fallback) {
      return this.props.fallback
    }

    return (
      <div className="flex items-center justify-center min-h-screen bg-dock-bg text-dock-text p-8">
        <div className="dock-panel p-6 max-w-lg w-full">
          <h1 className="dock-title font-bold text-signal-red mb-4">Dashboard error</h1>

          <div className="mb-6 p-3 bg-black/30 rounded border border-dock-border overflow-auto max-h-48">
            <code className="dock-small text-signal-yellow font-mono whitespace-pre-wrap">
              {error.message || 'Unknown error'}
            </code>
            {componentStack && (
              <details className="mt-2">
                <summary className="dock-small opacity-60 cursor-pointer">Component stack</summary>
                <pre className="text-[10px] opacity-50 mt-2 overflow-auto">{componentStack}</pre>
              </details>
            )}
          </div>

          <div className="flex gap-3">
            <button type="button" onClick={this.handleReset} className="dock-button flex-1">
              Retry
            </button>
            <button type="button" onClick={() => window.location.reload()} className="dock-button flex-1">
              Reload page
            </button>
          </div>
        </div>
      </div>
    )
  }
}
