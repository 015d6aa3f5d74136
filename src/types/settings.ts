import type { ContainerOverride, SortSettings } from './service'

export interface UiSettings {
  background: string
  cardBackground: string
  textColor: string
  accentColor: string
  borderColor: string
  borderRadius: number
  fontSizeBase: number
  fontSizeLarge: number
  fontSizeSmall: number
}

export interface DiskSettings {
  showSystem: boolean   // "/" and "/boot"
  showMounted: boolean  // network shares
}

export interface Favorite {
  name: string
  url: string
  icon: string
}

export interface SettingsDocument {
  settingsVersion: string
  containers: Record<string, ContainerOverride>
  sortSettings: SortSettings
  uiSettings: UiSettings
  diskSettings: DiskSettings
  favorites: Favorite[]
}
