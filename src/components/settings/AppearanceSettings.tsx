import { useEffect, useState } from 'react'
import { useUiSettings, useUpdateUiSettings } from '../../api/hooks/useSettings'
import type { UiSettings } from '../../types'

type ColorField = 'background' | 'cardBackground' | 'textColor' | 'accentColor' | 'borderColor'
type SizeField = 'borderRadius' | 'fontSizeBase' | 'fontSizeLarge' | 'fontSizeSmall'

const colorFields: Array<{ key: ColorField; label: string }> = [
  { key: 'background', label: 'Background' },
  { key: 'cardBackground', label: 'Tiles' },
  { key: 'textColor', label: 'Text' },
  { key: 'accentColor', label: 'Accent' },
  { key: 'borderColor', label: 'Borders' },
]

const sizeFields: Array<{ key: SizeField; label: string; min: number; max: number }> = [
  { key: 'borderRadius', label: 'Corner radius', min: 0, max: 32 },
  { key: 'fontSizeBase', label: 'Text size', min: 8, max: 32 },
  { key: 'fontSizeLarge', label: 'Title size', min: 8, max: 40 },
  { key: 'fontSizeSmall', label: 'Small text size', min: 6, max: 24 },
]

export function AppearanceSettings() {
  const { data: saved } = useUiSettings()
  const update = useUpdateUiSettings()
  const [draft, setDraft] = useState<UiSettings | null>(null)

  useEffect(() => {
    if (saved) setDraft(saved)
  }, [saved])

  if (!draft) {
    return (
      <section className="dock-panel p-4">
        <h2 className="dock-heading">Appearance</h2>
      </section>
    )
  }

  return (
    <section className="dock-panel p-4">
      <h2 className="dock-heading mb-3">Appearance</h2>

      <div className="grid grid-cols-2 sm:grid-cols-5 gap-3 mb-4">
        {colorFields.map(({ key, label }) => (
          <label key={key} className="flex flex-col gap-1">
            <span className="dock-small opacity-70">{label}</span>
            <input
              type="color"
              value={draft[key]}
              onChange={(e) => setDraft({ ...draft, [key]: e.target.value })}
              className="h-8 w-full bg-transparent"
            />
          </label>
        ))}
      </div>

      <div className="grid grid-cols-2 sm:grid-cols-4 gap-3 mb-4">
        {sizeFields.map(({ key, label, min, max }) => (
          <label key={key} className="flex flex-col gap-1">
            <span className="dock-small opacity-70">{label}</span>
            <input
              type="number"
              min={min}
              max={max}
              value={draft[key]}
              onChange={(e) => {
                const value = Number(e.target.value)
                if (Number.isInteger(value) && value >= min && value <= max) {
                  setDraft({ ...draft, [key]: value })
                }
              }}
              className="dock-input"
            />
          </label>
        ))}
      </div>

      <div className="flex justify-end gap-2">
        <button type="button" className="dock-button" onClick={() => saved && setDraft(saved)} disabled={draft === saved}>
          Revert
        </button>
        <button
          type="button"
          className="dock-button border-dock-accent"
          onClick={() => update.mutate(draft)}
          disabled={update.isPending || draft === saved}
        >
          {update.isPending ? 'Saving...' : 'Save'}
        </button>
      </div>
    </section>
  )
}
