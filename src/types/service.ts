import type { ContainerStatus } from './container'

// Per-container customization persisted in the settings document
export interface ContainerOverride {
  visible: boolean
  customName: string
  customUrl: string
  icon: string
}

/**
 * A discovered container as the dashboard shows it. Recomputed on every
 * discovery call.
 */
export interface Service {
  id: string
  displayName: string
  url: string          // customUrl when set, else autoUrl
  autoUrl: string      // derived from the lowest detected port
  customUrl: string
  hasCustomUrl: boolean
  icon: string
  ports: number[]      // ascending host ports in [80, 9999]
  status: ContainerStatus
  image: string
  visible: boolean
  containerName: string
}

export const SORT_METHODS = ['name_asc', 'name_desc', 'ports_asc', 'ports_desc'] as const

export type SortMethod = (typeof SORT_METHODS)[number]

export interface SortSettings {
  method: SortMethod
  groupByStatus: boolean
}

export type DiscoveryView = 'dashboard' | 'admin'
