export * from './container'
export * from './service'
export * from './settings'
export * from './system'

import type { Service } from './service'
import type { HostOverview } from './system'

export interface ServicesUpdate {
  services: Service[]
  /** False when Docker could not be reached */
  sourceAvailable: boolean
}

export interface ServerToClientEvents {
  'services:update': (update: ServicesUpdate) => void
  'system:stats': (overview: HostOverview) => void
}

export interface ClientToServerEvents {
  'services:refresh': () => void
}
