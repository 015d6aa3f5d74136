import { useEffect, useState } from 'react'
import { useFavorites, useUpdateFavorites } from '../../api/hooks/useSettings'
import type { Favorite } from '../../types'

const emptyFavorite = (): Favorite => ({ name: '', url: '', icon: '' })

export function FavoritesEditor() {
  const { data: saved } = useFavorites()
  const update = useUpdateFavorites()
  const [rows, setRows] = useState<Favorite[]>([])

  useEffect(() => {
    if (saved) setRows(saved)
  }, [saved])

  const setRow = (index: number, patch: Partial<Favorite>) => {
    setRows(rows.map((row, i) => (i === index ? { ...row, ...patch } : row)))
  }

  return (
    <section className="dock-panel p-4">
      <h2 className="dock-heading mb-3">Favorites</h2>
      <p className="dock-small opacity-60 mb-3">Links shown above the services. Rows without a URL are dropped on save.</p>

      <ul className="space-y-2 mb-3">
        {rows.map((row, index) => (
          <li key={index} className="flex gap-2">
            <input
              className="dock-input w-14"
              value={row.icon}
              placeholder="🌐"
              maxLength={16}
              onChange={(e) => setRow(index, { icon: e.target.value })}
              aria-label="Icon"
            />
            <input
              className="dock-input"
              value={row.name}
              placeholder="Name"
              maxLength={100}
              onChange={(e) => setRow(index, { name: e.target.value })}
              aria-label="Name"
            />
            <input
              className="dock-input"
              value={row.url}
              placeholder="http://router.lan"
              maxLength={2048}
              onChange={(e) => setRow(index, { url: e.target.value })}
              aria-label="URL"
            />
            <button
              type="button"
              className="dock-button"
              onClick={() => setRows(rows.filter((_, i) => i !== index))}
              aria-label={`Remove ${row.name || 'favorite'}`}
            >
              ×
            </button>
          </li>
        ))}
      </ul>

      <div className="flex justify-between">
        <button type="button" className="dock-button" onClick={() => setRows([...rows, emptyFavorite()])}>
          Add link
        </button>
        <button
          type="button"
          className="dock-button border-dock-accent"
          onClick={() => update.mutate(rows)}
          disabled={update.isPending}
        >
          {update.isPending ? 'Saving...' : 'Save'}
        </button>
      </div>
    </section>
  )
}
