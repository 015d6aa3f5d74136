import { useHostOverview } from '../../api/hooks/useSystemStats'
import { clampPercent, formatBytes, formatPercent, formatUptime, usageColor } from '../../lib/format'

function UsageBar({ percent }: { percent: number }) {
  return (
    <div className="h-2 bg-dock-bg rounded overflow-hidden">
      <div
        className={`h-full transition-all duration-500 ${usageColor(percent)}`}
        style={{ width: `${clampPercent(percent)}%` }}
      />
    </div>
  )
}

export function ResourceMonitor() {
  const { data: overview, isLoading } = useHostOverview()

  if (isLoading || !overview) {
    return (
      <div className="dock-panel p-4">
        <h3 className="dock-heading mb-3">System</h3>
        <div className="text-signal-yellow animate-pulse">Loading...</div>
      </div>
    )
  }

  const { system, containers } = overview

  return (
    <div className="space-y-3">
      <div className="dock-panel p-3">
        <div className="flex items-center justify-between mb-1">
          <span className="dock-heading">Host</span>
          <span className="font-bold truncate ml-2" title={system.hostname}>{system.hostname}</span>
        </div>
        {system.localIps.length > 0 && (
          <div className="dock-small opacity-60 font-mono">{system.localIps.join(', ')}</div>
        )}
        <div className="flex justify-between dock-small mt-2">
          <span className="opacity-60">Uptime</span>
          <span className="text-signal-green">{formatUptime(system.uptime)}</span>
        </div>
      </div>

      <div className="dock-panel p-3">
        <div className="flex items-center justify-between mb-2">
          <span className="dock-heading">CPU</span>
          <span className="font-bold">{formatPercent(system.cpu.usage)}</span>
        </div>
        <UsageBar percent={system.cpu.usage} />
        <div className="flex justify-between dock-small opacity-60 mt-1">
          <span>{system.cpu.cores} cores</span>
          {system.cpu.temperature !== null && <span>{system.cpu.temperature.toFixed(0)}°C</span>}
        </div>
      </div>

      <div className="dock-panel p-3">
        <div className="flex items-center justify-between mb-2">
          <span className="dock-heading">Memory</span>
          <span className="font-bold">{formatPercent(system.memory.percent)}</span>
        </div>
        <UsageBar percent={system.memory.percent} />
        <div className="dock-small opacity-60 mt-1">
          {formatBytes(system.memory.used)} / {formatBytes(system.memory.total)}
        </div>
      </div>

      <div className="dock-panel p-3">
        <div className="dock-heading mb-2">Containers</div>
        <div className="grid grid-cols-3 text-center">
          <div>
            <div className="dock-title font-bold">{containers.total}</div>
            <div className="dock-small opacity-60">total</div>
          </div>
          <div>
            <div className="dock-title font-bold text-signal-green">{containers.running}</div>
            <div className="dock-small opacity-60">running</div>
          </div>
          <div>
            <div className="dock-title font-bold opacity-70">{containers.stopped}</div>
            <div className="dock-small opacity-60">stopped</div>
          </div>
        </div>
      </div>
    </div>
  )
}
