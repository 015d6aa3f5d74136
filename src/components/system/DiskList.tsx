import { memo } from 'react'
import { useDisks } from '../../api/hooks/useSystemStats'
import type { DiskLevel } from '../../types'
import { clampPercent } from '../../lib/format'

const levelColors: Record<DiskLevel, string> = {
  normal: 'bg-dock-accent',
  warning: 'bg-signal-yellow',
  danger: 'bg-signal-red',
}

export const DiskList = memo(function DiskList() {
  const { data: disks, isLoading, error } = useDisks()

  return (
    <div className="dock-panel p-3">
      <h3 className="dock-heading mb-2">Disks</h3>

      {isLoading && <div className="text-signal-yellow animate-pulse">Loading...</div>}
      {error && <div className="text-signal-red dock-small">{error.message}</div>}
      {disks && disks.length === 0 && <div className="dock-small opacity-60 italic">No disks to show</div>}

      <ul className="space-y-2">
        {disks?.map((disk) => (
          <li key={disk.mountpoint}>
            <div className="flex items-center justify-between dock-small">
              <span className="flex items-center gap-1.5 min-w-0">
                <span aria-hidden="true">{disk.icon}</span>
                <span className="font-mono truncate" title={disk.mountpoint}>{disk.shortPath}</span>
              </span>
              <span className="opacity-60 whitespace-nowrap ml-2">{disk.kind}</span>
            </div>
            <div className="h-1.5 bg-dock-bg rounded overflow-hidden my-1">
              <div
                className={`h-full ${levelColors[disk.level]}`}
                style={{ width: `${clampPercent(disk.percent)}%` }}
              />
            </div>
            <div className="dock-small opacity-60">
              {disk.usedGb.toFixed(1)} / {disk.totalGb.toFixed(1)} GB ({disk.percent.toFixed(0)}%)
            </div>
          </li>
        ))}
      </ul>
    </div>
  )
})
