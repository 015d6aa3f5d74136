import { memo, useState } from 'react'
import { useContainerActions, useContainerUsage } from '../../api/hooks/useContainers'
import { formatBytes, formatPercent } from '../../lib/format'
import type { ContainerUsage } from '../../types'

type ConfirmAction = 'stop' | 'restart' | null

const ContainerUsageRow = memo(function ContainerUsageRow({ container }: { container: ContainerUsage }) {
  const { start, stop, restart } = useContainerActions(container.id)
  const [confirmAction, setConfirmAction] = useState<ConfirmAction>(null)
  const isRunning = container.status === 'running'

  const handleConfirm = () => {
    if (confirmAction === 'stop') {
      stop.mutate()
    } else if (confirmAction === 'restart') {
      restart.mutate()
    }
    setConfirmAction(null)
  }

  return (
    <tr className="border-t border-dock-border">
      <td className="py-1.5 pr-2">
        <span className="mr-1.5" aria-hidden="true">{container.icon}</span>
        <span className={isRunning ? '' : 'opacity-50'}>{container.name}</span>
      </td>
      <td className="pr-2 text-right font-mono">{isRunning ? formatPercent(container.cpu) : '-'}</td>
      <td className="pr-2 text-right font-mono">
        {isRunning ? formatBytes(container.memoryUsedMb * 1024 * 1024) : '-'}
      </td>
      <td className="pr-2 text-right font-mono opacity-70">
        {isRunning ? `${formatBytes(container.networkRx)} / ${formatBytes(container.networkTx)}` : '-'}
      </td>
      <td className="text-right whitespace-nowrap">
        {confirmAction ? (
          <span className="inline-flex items-center gap-1">
            <span className="text-signal-yellow">{confirmAction === 'stop' ? 'Stop' : 'Restart'}?</span>
            <button
              type="button"
              onClick={handleConfirm}
              className="px-1.5 bg-signal-red/20 text-signal-red border border-signal-red/30 rounded"
              aria-label={`Confirm ${confirmAction}`}
            >
              Yes
            </button>
            <button
              type="button"
              onClick={() => setConfirmAction(null)}
              className="px-1.5 bg-gray-500/20 border border-gray-500/30 rounded"
              aria-label="Cancel"
            >
              No
            </button>
          </span>
        ) : isRunning ? (
          <span className="inline-flex gap-1">
            <button
              type="button"
              onClick={() => setConfirmAction('restart')}
              disabled={restart.isPending}
              className="px-1.5 text-signal-yellow border border-signal-yellow/30 rounded disabled:opacity-50"
              aria-label={`Restart ${container.name}`}
            >
              ↻
            </button>
            <button
              type="button"
              onClick={() => setConfirmAction('stop')}
              disabled={stop.isPending}
              className="px-1.5 text-signal-red border border-signal-red/30 rounded disabled:opacity-50"
              aria-label={`Stop ${container.name}`}
            >
              ■
            </button>
          </span>
        ) : (
          <button
            type="button"
            onClick={() => start.mutate()}
            disabled={start.isPending}
            className="px-1.5 text-signal-green border border-signal-green/30 rounded disabled:opacity-50"
            aria-label={`Start ${container.name}`}
          >
            ▶
          </button>
        )}
      </td>
    </tr>
  )
})

export const ContainerUsageList = memo(function ContainerUsageList() {
  const { data: containers, isLoading, error } = useContainerUsage()

  return (
    <div className="dock-panel p-3 overflow-x-auto">
      <h3 className="dock-heading mb-2">Container usage</h3>

      {isLoading && <div className="text-signal-yellow animate-pulse">Loading...</div>}
      {error && <div className="text-signal-red dock-small">{error.message}</div>}

      {containers && containers.length > 0 && (
        <table className="w-full dock-small">
          <thead>
            <tr className="opacity-60 text-left">
              <th className="font-normal pb-1">Name</th>
              <th className="font-normal pb-1 text-right pr-2">CPU</th>
              <th className="font-normal pb-1 text-right pr-2">Memory</th>
              <th className="font-normal pb-1 text-right pr-2">Net rx / tx</th>
              <th />
            </tr>
          </thead>
          <tbody>
            {containers.map((container) => (
              <ContainerUsageRow key={container.id} container={container} />
            ))}
          </tbody>
        </table>
      )}
    </div>
  )
})
