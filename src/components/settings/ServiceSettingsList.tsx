import { memo } from 'react'
import { useAllServices } from '../../api/hooks/useServices'
import { useContainerOverrides, useResetOverride, useUpdateOverride } from '../../api/hooks/useSettings'
import { useDashboardStore } from '../../stores/dashboardStore'
import { ServiceEditor } from './ServiceEditor'

export const ServiceSettingsList = memo(function ServiceSettingsList() {
  const { data, isLoading, error } = useAllServices()
  const { data: overrides } = useContainerOverrides()
  const update = useUpdateOverride()
  const reset = useResetOverride()
  const editingServiceId = useDashboardStore((state) => state.editingServiceId)
  const openEditor = useDashboardStore((state) => state.openEditor)
  const closeEditor = useDashboardStore((state) => state.closeEditor)

  const editing = data?.services.find((s) => s.id === editingServiceId)

  return (
    <section className="dock-panel p-4">
      <h2 className="dock-heading mb-3">Services</h2>

      {isLoading && <div className="text-signal-yellow animate-pulse">Loading...</div>}
      {error && <div className="text-signal-red">{error.message}</div>}
      {data && !data.sourceAvailable && (
        <div className="text-signal-yellow dock-small mb-2">Docker is not reachable; no services listed.</div>
      )}

      <ul className="divide-y divide-dock-border">
        {data?.services.map((service) => (
          <li key={service.id} className="flex items-center gap-3 py-2">
            <input
              type="checkbox"
              checked={service.visible}
              onChange={(e) => update.mutate({ id: service.id, patch: { visible: e.target.checked } })}
              aria-label={`Show ${service.displayName} on the dashboard`}
            />
            <span aria-hidden="true">{service.icon}</span>
            <div className="min-w-0 flex-1">
              <div className={`truncate ${service.visible ? '' : 'opacity-50'}`}>{service.displayName}</div>
              <div className="dock-small opacity-50 truncate">
                {service.containerName} · {service.url || 'no link'}
              </div>
            </div>
            <button type="button" className="dock-button dock-small" onClick={() => openEditor(service.id)}>
              Edit
            </button>
            <button
              type="button"
              className="dock-button dock-small"
              onClick={() => reset.mutate(service.id)}
              aria-label={`Reset ${service.displayName}`}
            >
              Reset
            </button>
          </li>
        ))}
      </ul>

      {editing && <ServiceEditor
          key={editing.id}
          service={editing}
          override={overrides?.[editing.id]}
          onClose={closeEditor}
        />}
    </section>
  )
})
