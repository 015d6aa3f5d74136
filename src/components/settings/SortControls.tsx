import { SORT_METHODS, type SortMethod, type SortSettings } from '../../types'

const labels: Record<SortMethod, string> = {
  name_asc: 'Name (A-Z)',
  name_desc: 'Name (Z-A)',
  ports_asc: 'Port (low to high)',
  ports_desc: 'Port (high to low)',
}

interface SortControlsProps {
  settings: SortSettings
  onChange: (patch: Partial<SortSettings>) => void
  disabled?: boolean
}

export function SortControls({ settings, onChange, disabled }: SortControlsProps) {
  return (
    <div className="flex flex-wrap items-center gap-4">
      <label className="flex items-center gap-2">
        <span className="dock-small opacity-70">Sort by</span>
        <select
          className="dock-input w-auto"
          value={settings.method}
          disabled={disabled}
          onChange={(e) => {
            const method = SORT_METHODS.find((m) => m === e.target.value)
            if (method) onChange({ method })
          }}
        >
          {SORT_METHODS.map((method) => (
            <option key={method} value={method}>
              {labels[method]}
            </option>
          ))}
        </select>
      </label>

      <label className="flex items-center gap-2">
        <input
          type="checkbox"
          checked={settings.groupByStatus}
          disabled={disabled}
          onChange={(e) => onChange({ groupByStatus: e.target.checked })}
        />
        <span>Running services first</span>
      </label>
    </div>
  )
}
