import { memo, useState } from 'react'
import type { ContainerStatus, Service } from '../../types'

interface ServiceTileProps {
  service: Service
  onHide?: (service: Service) => void
  isHiding?: boolean
}

const statusColors: Record<ContainerStatus, string> = {
  running: 'bg-signal-green',
  exited: 'bg-gray-500',
  paused: 'bg-signal-yellow',
  created: 'bg-signal-blue',
  restarting: 'bg-signal-yellow animate-pulse',
  removing: 'bg-signal-red animate-pulse',
  dead: 'bg-signal-red',
}

const MAX_PORT_CHIPS = 3

export const ServiceTile = memo(function ServiceTile({ service, onHide, isHiding }: ServiceTileProps) {
  const [confirmHide, setConfirmHide] = useState(false)
  const isRunning = service.status === 'running'
  const hasUrl = service.url !== ''

  const body = (
    <>
      <div className="flex items-center gap-3 mb-2">
        <span className="text-3xl leading-none" aria-hidden="true">{service.icon}</span>
        <div className="min-w-0 flex-1">
          <h3 className="dock-title font-bold truncate" title={service.displayName}>
            {service.displayName}
          </h3>
          <div className="flex items-center gap-1.5 dock-small opacity-70">
            <span className={`w-2 h-2 rounded-full ${statusColors[service.status]}`} />
            <span>{service.status}</span>
          </div>
        </div>
      </div>

      <div className="dock-small opacity-60 truncate mb-2" title={service.image}>
        {service.image.split('/').pop()}
      </div>

      {service.ports.length > 0 ? (
        <div className="flex flex-wrap gap-1 dock-small">
          {service.ports.slice(0, MAX_PORT_CHIPS).map((port) => (
            <span key={port} className="px-1.5 py-0.5 bg-dock-bg rounded">
              {port}
            </span>
          ))}
          {service.ports.length > MAX_PORT_CHIPS && (
            <span className="opacity-60">+{service.ports.length - MAX_PORT_CHIPS}</span>
          )}
        </div>
      ) : (
        <div className="dock-small opacity-50 italic">
          {service.hasCustomUrl ? 'Custom link' : 'No web port'}
        </div>
      )}
    </>
  )

  return (
    <div
      className={`dock-panel relative p-4 transition-colors ${
        hasUrl ? 'hover:border-dock-accent' : ''
      } ${isRunning ? '' : 'opacity-60'}`}
    >
      {hasUrl ? (
        <a
          href={service.url}
          target="_blank"
          rel="noopener noreferrer"
          className="block"
          aria-label={`Open ${service.displayName}`}
        >
          {body}
        </a>
      ) : (
        body
      )}

      {onHide && (
        <div className="absolute top-2 right-2 flex items-center gap-1 dock-small">
          {confirmHide ? (
            <>
              <span className="text-signal-yellow">Hide?</span>
              <button
                type="button"
                onClick={() => {
                  setConfirmHide(false)
                  onHide(service)
                }}
                className="px-1.5 bg-signal-red/20 text-signal-red border border-signal-red/30 rounded"
                aria-label={`Confirm hiding ${service.displayName}`}
              >
                Yes
              </button>
              <button
                type="button"
                onClick={() => setConfirmHide(false)}
                className="px-1.5 bg-gray-500/20 border border-gray-500/30 rounded"
                aria-label="Cancel"
              >
                No
              </button>
            </>
          ) : (
            <button
              type="button"
              onClick={() => setConfirmHide(true)}
              disabled={isHiding}
              className="px-1.5 opacity-40 hover:opacity-100 transition-opacity"
              aria-label={`Hide ${service.displayName}`}
            >
              ×
            </button>
          )}
        </div>
      )}
    </div>
  )
})
