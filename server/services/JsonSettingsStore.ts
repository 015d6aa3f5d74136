import fs from 'fs/promises'
import path from 'path'
import type {
  ContainerOverride,
  DiskSettings,
  Favorite,
  SettingsDocument,
  SortSettings,
  UiSettings,
} from '../../src/types'
import { SettingsReadError, SettingsWriteError, errorMessage } from '../errors'
import {
  SETTINGS_VERSION,
  cleanFavorites,
  defaultDocument,
  fromLegacyDocument,
  isLegacyDocument,
  mergeOverride,
  withDocumentDefaults,
} from './settingsSchema'
import type { SettingsStore } from './SettingsStore'

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Settings kept in a single JSON document on disk.
 *
 * Every operation re-reads the file, so edits made while the server runs are
 * picked up. Operations run one at a time and writes go through a temp file
 * and a rename.
 */
export class JsonSettingsStore implements SettingsStore {
  private queue: Promise<unknown> = Promise.resolve()

  constructor(private readonly filePath: string) {}

  /**
   * Run a task after every task queued before it has settled
   */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task)
    // Failures reach the caller through `run`; the queue only tracks order
    this.queue = run.catch(() => undefined)
    return run
  }

  private async load(): Promise<SettingsDocument> {
    let text: string
    try {
      text = await fs.readFile(this.filePath, 'utf-8')
    } catch (error) {
      if (isMissingFile(error)) {
        const doc = defaultDocument()
        if (await this.persistLoaded(doc)) {
          console.log(`[settings] Created ${this.filePath} with defaults`)
        }
        return doc
      }
      throw new SettingsReadError(`Cannot read ${this.filePath}: ${errorMessage(error)}`, { cause: error })
    }

    let raw: unknown
    try {
      raw = JSON.parse(text)
    } catch (error) {
      throw new SettingsReadError(`${this.filePath} is not valid JSON: ${errorMessage(error)}`, { cause: error })
    }

    if (isLegacyDocument(raw)) {
      console.log(`[settings] Migrating ${this.filePath} to version ${SETTINGS_VERSION}`)
      const migrated = fromLegacyDocument(raw)
      await this.persistLoaded(migrated)
      return migrated
    }

    const doc = withDocumentDefaults(raw)
    if (typeof raw === 'object' && raw !== null && 'settingsVersion' in raw && raw.settingsVersion !== SETTINGS_VERSION) {
      console.log(`[settings] Upgrading ${this.filePath} to version ${SETTINGS_VERSION}`)
      await this.persistLoaded(doc)
    }
    return doc
  }

  /**
   * Saves a document produced while loading. Reads go on with the in-memory
   * copy when the file cannot be written.
   */
  private async persistLoaded(doc: SettingsDocument): Promise<boolean> {
    try {
      await this.save(doc)
      return true
    } catch (error) {
      if (!(error instanceof SettingsWriteError)) throw error
      console.warn(`[settings] ${error.message}; using settings in memory`)
      return false
    }
  }

  private async save(doc: SettingsDocument): Promise<void> {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true })
      await fs.writeFile(tmpPath, JSON.stringify(doc, null, 2) + '\n', 'utf-8')
      await fs.rename(tmpPath, this.filePath)
    } catch (error) {
      throw new SettingsWriteError(`Cannot write ${this.filePath}: ${errorMessage(error)}`, { cause: error })
    }
  }

  private read<T>(select: (doc: SettingsDocument) => T): Promise<T> {
    return this.exclusive(async () => select(await this.load()))
  }

  private update<T>(apply: (doc: SettingsDocument) => T): Promise<T> {
    return this.exclusive(async () => {
      const doc = await this.load()
      const result = apply(doc)
      await this.save(doc)
      return result
    })
  }

  getDocument(): Promise<SettingsDocument> {
    return this.read((doc) => doc)
  }

  getOverride(containerId: string): Promise<ContainerOverride | undefined> {
    return this.read((doc) =>
      Object.hasOwn(doc.containers, containerId) ? doc.containers[containerId] : undefined
    )
  }

  listOverrides(): Promise<Record<string, ContainerOverride>> {
    return this.read((doc) => doc.containers)
  }

  setOverride(containerId: string, patch: Partial<ContainerOverride>): Promise<ContainerOverride> {
    return this.update((doc) => {
      const current = Object.hasOwn(doc.containers, containerId) ? doc.containers[containerId] : undefined
      const next = mergeOverride(current, patch)
      doc.containers[containerId] = next
      return next
    })
  }

  deleteOverride(containerId: string): Promise<boolean> {
    return this.exclusive(async () => {
      const doc = await this.load()
      if (!Object.hasOwn(doc.containers, containerId)) {
        return false
      }
      delete doc.containers[containerId]
      await this.save(doc)
      return true
    })
  }

  hideService(containerId: string): Promise<ContainerOverride> {
    return this.setOverride(containerId, { visible: false })
  }

  getSortSettings(): Promise<SortSettings> {
    return this.read((doc) => doc.sortSettings)
  }

  setSortSettings(patch: Partial<SortSettings>): Promise<SortSettings> {
    return this.update((doc) => {
      doc.sortSettings = { ...doc.sortSettings, ...patch }
      return doc.sortSettings
    })
  }

  getUiSettings(): Promise<UiSettings> {
    return this.read((doc) => doc.uiSettings)
  }

  setUiSettings(patch: Partial<UiSettings>): Promise<UiSettings> {
    return this.update((doc) => {
      doc.uiSettings = { ...doc.uiSettings, ...patch }
      return doc.uiSettings
    })
  }

  getDiskSettings(): Promise<DiskSettings> {
    return this.read((doc) => doc.diskSettings)
  }

  setDiskSettings(patch: Partial<DiskSettings>): Promise<DiskSettings> {
    return this.update((doc) => {
      doc.diskSettings = { ...doc.diskSettings, ...patch }
      return doc.diskSettings
    })
  }

  getFavorites(): Promise<Favorite[]> {
    return this.read((doc) => doc.favorites)
  }

  /**
   * Replace the favorites list. Entries without a URL are dropped.
   */
  setFavorites(favorites: Favorite[]): Promise<Favorite[]> {
    return this.update((doc) => {
      doc.favorites = cleanFavorites(favorites)
      return doc.favorites
    })
  }
}
