/**
 * Shared service singletons
 * Import services from here to ensure single instances are used across the application
 */

import { config } from '../config'
import { ContainerManager, containerManager } from './ContainerManager'
import { resolveHostIp } from './hostAddress'
import { JsonSettingsStore } from './JsonSettingsStore'
import { ServiceDiscovery } from './ServiceDiscovery'
import { SystemMonitor, systemMonitor } from './SystemMonitor'

const settingsStore = new JsonSettingsStore(config.settingsFile)

const serviceDiscovery = new ServiceDiscovery({
  source: containerManager,
  store: settingsStore,
  resolveHostIp: () => resolveHostIp(config.hostIp),
})

export {
  // Singleton instances
  containerManager,
  settingsStore,
  systemMonitor,
  serviceDiscovery,
  // Classes (for typing)
  ContainerManager,
  JsonSettingsStore,
  ServiceDiscovery,
  SystemMonitor,
}
