import type {
  ContainerOverride,
  DiscoveryView,
  RawContainer,
  Service,
  SortSettings,
} from '../../src/types'
import {
  ContainerSourceUnavailableError,
  SettingsReadError,
  SettingsWriteError,
} from '../errors'
import type { ContainerSource } from './ContainerSource'
import { normalizeContainer } from './normalizer'
import { DEFAULT_SORT_SETTINGS } from './settingsSchema'
import type { SettingsStore } from './SettingsStore'
import { sortServices } from './sorter'

export interface SkippedContainer {
  containerId: string
  containerName: string
  reason: string
}

export interface DiscoveryResult {
  services: Service[]
  /** False when the container source could not be reached */
  sourceAvailable: boolean
  skipped: SkippedContainer[]
}

export interface ServiceDiscoveryDeps {
  source: ContainerSource
  store: SettingsStore
  resolveHostIp: () => Promise<string>
}

type OverrideRead =
  | { status: 'found'; override: ContainerOverride | undefined }
  | { status: 'failed' }

/**
 * Turns the host's containers into the ordered service list the dashboard
 * and the settings page show.
 *
 * An unreachable container source, an unreadable settings document and a
 * failed write of default settings degrade the result instead of throwing.
 */
export class ServiceDiscovery {
  constructor(private readonly deps: ServiceDiscoveryDeps) {}

  /**
   * Visible services, sorted
   */
  async listForDashboard(): Promise<Service[]> {
    return (await this.discover('dashboard')).services
  }

  /**
   * Every service including hidden ones, sorted
   */
  async listForAdmin(): Promise<Service[]> {
    return (await this.discover('admin')).services
  }

  async discover(view: DiscoveryView): Promise<DiscoveryResult> {
    let containers: RawContainer[]
    try {
      containers = await this.deps.source.listContainers(true)
    } catch (error) {
      if (!(error instanceof ContainerSourceUnavailableError)) throw error
      console.error('[discovery] Container source unavailable:', error.message)
      return { services: [], sourceAvailable: false, skipped: [] }
    }

    const hostIp = await this.deps.resolveHostIp()
    const services: Service[] = []
    const skipped: SkippedContainer[] = []

    for (const container of containers) {
      const read = await this.readOverride(container.id)
      const outcome = normalizeContainer(
        container,
        read.status === 'found' ? read.override : undefined,
        hostIp
      )

      if (outcome.status === 'skip') {
        console.warn(`[discovery] Skipping ${outcome.containerName || outcome.containerId}: ${outcome.reason}`)
        skipped.push({
          containerId: outcome.containerId,
          containerName: outcome.containerName,
          reason: outcome.reason,
        })
        continue
      }

      // A failed read may mean a damaged document; leave it for the user to fix
      if (outcome.overrideCreated && read.status === 'found') {
        await this.persistDefaultOverride(container.id, outcome.override)
      }

      if (view === 'admin' || outcome.override.visible) {
        services.push(outcome.service)
      }
    }

    const sorted = sortServices(services, await this.readSortSettings())
    return { services: sorted, sourceAvailable: true, skipped }
  }

  private async readOverride(containerId: string): Promise<OverrideRead> {
    try {
      return { status: 'found', override: await this.deps.store.getOverride(containerId) }
    } catch (error) {
      if (!(error instanceof SettingsReadError)) throw error
      console.warn(`[discovery] Cannot read settings for ${containerId.substring(0, 12)}, using defaults:`, error.message)
      return { status: 'failed' }
    }
  }

  private async persistDefaultOverride(containerId: string, override: ContainerOverride): Promise<void> {
    try {
      await this.deps.store.setOverride(containerId, override)
    } catch (error) {
      if (!(error instanceof SettingsWriteError || error instanceof SettingsReadError)) throw error
      console.warn(`[discovery] Cannot save default settings for ${containerId.substring(0, 12)}:`, error.message)
    }
  }

  private async readSortSettings(): Promise<SortSettings> {
    try {
      return await this.deps.store.getSortSettings()
    } catch (error) {
      if (!(error instanceof SettingsReadError)) throw error
      console.warn('[discovery] Cannot read sort settings, using defaults:', error.message)
      return DEFAULT_SORT_SETTINGS
    }
  }
}
