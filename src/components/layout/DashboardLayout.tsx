import type { ReactNode } from 'react'
import { StatusBar } from './StatusBar'
import { useConnectionStatus, useHostOverview } from '../../api/hooks/useSystemStats'
import { requestServicesRefresh } from '../../api/socket'
import { useDashboardStore, type DashboardView } from '../../stores/dashboardStore'

interface DashboardLayoutProps {
  children: ReactNode
}

const views: Array<{ view: DashboardView; label: string }> = [
  { view: 'dashboard', label: 'Dashboard' },
  { view: 'settings', label: 'Settings' },
]

export function DashboardLayout({ children }: DashboardLayoutProps) {
  const { connected, error } = useConnectionStatus()
  const { data: overview } = useHostOverview()
  const view = useDashboardStore((state) => state.view)
  const setView = useDashboardStore((state) => state.setView)

  return (
    <div className="min-h-screen flex flex-col bg-dock-bg text-dock-text">
      <header className="h-12 border-b border-dock-border flex items-center px-4 gap-4">
        <h1 className="dock-title font-bold">Dockboard</h1>
        {overview && <span className="dock-small opacity-60">{overview.system.hostname}</span>}

        <nav className="flex gap-1 ml-4">
          {views.map((item) => (
            <button
              key={item.view}
              type="button"
              onClick={() => setView(item.view)}
              aria-current={view === item.view ? 'page' : undefined}
              className={`px-3 py-1 rounded-tile dock-small ${
                view === item.view ? 'bg-dock-panel border border-dock-accent' : 'opacity-70 hover:opacity-100'
              }`}
            >
              {item.label}
            </button>
          ))}
        </nav>

        <div className="flex-1" />

        <button
          type="button"
          className="dock-button"
          onClick={requestServicesRefresh}
          disabled={!connected}
          title="Rescan containers"
        >
          ↻ Refresh
        </button>

        <div className="flex items-center gap-2 dock-small">
          {connected ? (
            <>
              <span className="w-2 h-2 rounded-full bg-signal-green" />
              <span className="opacity-70">Live</span>
            </>
          ) : error ? (
            <>
              <span className="w-2 h-2 rounded-full bg-signal-red" />
              <span className="text-signal-red" title={error}>Offline</span>
            </>
          ) : (
            <>
              <span className="w-2 h-2 rounded-full bg-signal-yellow animate-pulse" />
              <span className="text-signal-yellow">Connecting...</span>
            </>
          )}
        </div>
      </header>

      <main className="flex-1 p-4 overflow-auto">
        {children}
      </main>

      <StatusBar />
    </div>
  )
}
