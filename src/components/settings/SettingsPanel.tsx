import { useDiskSettings, useSortSettings, useUpdateDiskSettings, useUpdateSortSettings } from '../../api/hooks/useSettings'
import { AppearanceSettings } from './AppearanceSettings'
import { FavoritesEditor } from './FavoritesEditor'
import { ServiceSettingsList } from './ServiceSettingsList'
import { SortControls } from './SortControls'

function DisplaySettings() {
  const { data: sort } = useSortSettings()
  const updateSort = useUpdateSortSettings()
  const { data: disks } = useDiskSettings()
  const updateDisks = useUpdateDiskSettings()

  return (
    <section className="dock-panel p-4 space-y-4">
      <h2 className="dock-heading">Display</h2>

      {sort && (
        <SortControls settings={sort} onChange={(patch) => updateSort.mutate(patch)} disabled={updateSort.isPending} />
      )}

      {disks && (
        <div className="flex flex-wrap gap-4">
          <label className="flex items-center gap-2">
            <input
              type="checkbox"
              checked={disks.showSystem}
              onChange={(e) => updateDisks.mutate({ showSystem: e.target.checked })}
            />
            <span>Show system disks</span>
          </label>
          <label className="flex items-center gap-2">
            <input
              type="checkbox"
              checked={disks.showMounted}
              onChange={(e) => updateDisks.mutate({ showMounted: e.target.checked })}
            />
            <span>Show network shares</span>
          </label>
        </div>
      )}
    </section>
  )
}

export function SettingsPanel() {
  return (
    <div className="max-w-4xl mx-auto space-y-4">
      <ServiceSettingsList />
      <DisplaySettings />
      <AppearanceSettings />
      <FavoritesEditor />
    </div>
  )
}
