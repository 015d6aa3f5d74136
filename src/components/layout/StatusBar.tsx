import { useEffect, useState } from 'react'
import { useConnectionStatus, useHostOverview } from '../../api/hooks/useSystemStats'
import { useSocketStore } from '../../stores/socketStore'

export function StatusBar() {
  const [time, setTime] = useState(new Date())
  const { data: overview } = useHostOverview()
  const { connected } = useConnectionStatus()
  const sourceAvailable = useSocketStore((state) => state.services?.sourceAvailable ?? true)

  useEffect(() => {
    const interval = setInterval(() => setTime(new Date()), 1000)
    return () => clearInterval(interval)
  }, [])

  const counts = overview?.containers

  return (
    <footer className="h-8 border-t border-dock-border flex items-center px-4 dock-small bg-dock-panel">
      <div className="flex items-center gap-1.5">
        <span className={`w-2 h-2 rounded-full ${connected ? 'bg-signal-green' : 'bg-signal-yellow animate-pulse'}`} />
        <span className="opacity-70">{connected ? 'Socket connected' : 'Polling'}</span>
      </div>

      <div className="flex-1 flex items-center justify-center gap-6">
        {counts && (
          <>
            <span className="opacity-70">{counts.total} containers</span>
            <span className="text-signal-green">{counts.running} running</span>
            <span className="opacity-70">{counts.stopped} stopped</span>
          </>
        )}
        {!sourceAvailable && <span className="text-signal-red">Docker unreachable</span>}
      </div>

      <span className="font-mono opacity-70">{time.toLocaleTimeString()}</span>
    </footer>
  )
}
