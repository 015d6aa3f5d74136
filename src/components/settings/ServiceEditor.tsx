import { useCallback, useState, type FormEvent } from 'react'
import { useDialog } from '../../hooks/useDialog'
import { useUpdateOverride } from '../../api/hooks/useSettings'
import type { ContainerOverride, Service } from '../../types'

interface ServiceEditorProps {
  service: Service
  override: ContainerOverride | undefined
  onClose: () => void
}

/**
 * Dialog for the name, link and icon a user gives one service
 */
export function ServiceEditor({ service, override, onClose }: ServiceEditorProps) {
  const [customName, setCustomName] = useState(override?.customName ?? '')
  const [customUrl, setCustomUrl] = useState(service.customUrl)
  const [icon, setIcon] = useState(service.icon)
  const update = useUpdateOverride()

  const close = useCallback(() => onClose(), [onClose])
  const { containerRef, handleKeyDown } = useDialog<HTMLFormElement>(true, close)

  const handleSubmit = (e: FormEvent) => {
    e.preventDefault()
    update.mutate(
      {
        id: service.id,
        patch: {
          customName: customName.trim(),
          customUrl: customUrl.trim(),
          icon: icon.trim(),
        },
      },
      { onSuccess: onClose }
    )
  }

  return (
    <div className="fixed inset-0 z-40 bg-black/60 flex items-center justify-center p-4" onClick={onClose}>
      <form
        ref={containerRef}
        role="dialog"
        aria-modal="true"
        aria-labelledby="service-editor-title"
        onKeyDown={handleKeyDown}
        onSubmit={handleSubmit}
        onClick={(e) => e.stopPropagation()}
        className="dock-panel w-full max-w-md p-5 space-y-4"
      >
        <h2 id="service-editor-title" className="dock-title font-bold">
          {service.containerName}
        </h2>

        <label className="block space-y-1">
          <span className="dock-small opacity-70">Display name</span>
          <input
            className="dock-input"
            value={customName}
            onChange={(e) => setCustomName(e.target.value)}
            placeholder={service.displayName}
            maxLength={100}
          />
        </label>

        <label className="block space-y-1">
          <span className="dock-small opacity-70">Link</span>
          <input
            className="dock-input"
            value={customUrl}
            onChange={(e) => setCustomUrl(e.target.value)}
            placeholder={service.autoUrl || 'http://host:port'}
            maxLength={2048}
          />
          <span className="dock-small opacity-50">Leave empty to use {service.autoUrl || 'the detected port'}</span>
        </label>

        <label className="block space-y-1">
          <span className="dock-small opacity-70">Icon</span>
          <input className="dock-input w-20" value={icon} onChange={(e) => setIcon(e.target.value)} maxLength={16} />
        </label>

        <div className="flex justify-end gap-2">
          <button type="button" onClick={onClose} className="dock-button">
            Cancel
          </button>
          <button type="submit" disabled={update.isPending} className="dock-button border-dock-accent">
            {update.isPending ? 'Saving...' : 'Save'}
          </button>
        </div>
      </form>
    </div>
  )
}
