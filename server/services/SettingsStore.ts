import type {
  ContainerOverride,
  DiskSettings,
  Favorite,
  SortSettings,
  UiSettings,
} from '../../src/types'

/**
 * Persisted dashboard settings. Implementations serialize their own reads and
 * writes; callers never lock.
 */
export interface SettingsStore {
  getOverride(containerId: string): Promise<ContainerOverride | undefined>
  listOverrides(): Promise<Record<string, ContainerOverride>>
  /** Creates the override with defaults first when it does not exist. */
  setOverride(containerId: string, patch: Partial<ContainerOverride>): Promise<ContainerOverride>
  /** Resolves false when there was nothing to delete. */
  deleteOverride(containerId: string): Promise<boolean>
  hideService(containerId: string): Promise<ContainerOverride>

  getSortSettings(): Promise<SortSettings>
  setSortSettings(patch: Partial<SortSettings>): Promise<SortSettings>

  getUiSettings(): Promise<UiSettings>
  setUiSettings(patch: Partial<UiSettings>): Promise<UiSettings>

  getDiskSettings(): Promise<DiskSettings>
  setDiskSettings(patch: Partial<DiskSettings>): Promise<DiskSettings>

  getFavorites(): Promise<Favorite[]>
  setFavorites(favorites: Favorite[]): Promise<Favorite[]>
}
