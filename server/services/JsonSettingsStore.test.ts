import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { SettingsReadError, SettingsWriteError } from '../errors'
import { JsonSettingsStore } from './JsonSettingsStore'
import { DEFAULT_SORT_SETTINGS, SETTINGS_VERSION } from './settingsSchema'

describe('JsonSettingsStore', () => {
  let dir: string
  let file: string
  let store: JsonSettingsStore

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'dockboard-settings-'))
    file = path.join(dir, 'nested', 'settings.json')
    store = new JsonSettingsStore(file)
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  async function readFile(): Promise<unknown> {
    return JSON.parse(await fs.readFile(file, 'utf-8'))
  }

  it('creates the document with defaults on first read', async () => {
    expect(await store.getSortSettings()).toEqual(DEFAULT_SORT_SETTINGS)
    expect(await readFile()).toMatchObject({
      settingsVersion: SETTINGS_VERSION,
      containers: {},
      favorites: [],
    })
  })

  it('creates overrides from defaults and merges later patches', async () => {
    expect(await store.getOverride('abc')).toBeUndefined()

    await store.setOverride('abc', { customName: 'Wiki' })
    const updated = await store.setOverride('abc', { customUrl: ' wiki.lan ' })

    expect(updated).toEqual({ visible: true, customName: 'Wiki', customUrl: 'http://wiki.lan', icon: '🐳' })
    expect(await store.getOverride('abc')).toEqual(updated)
  })

  it('hides a service', async () => {
    expect((await store.hideService('abc')).visible).toBe(false)
    expect(await store.listOverrides()).toEqual({
      abc: { visible: false, customName: '', customUrl: '', icon: '🐳' },
    })
  })

  it('reports whether an override was deleted', async () => {
    await store.setOverride('abc', {})
    expect(await store.deleteOverride('abc')).toBe(true)
    expect(await store.deleteOverride('abc')).toBe(false)
  })

  it('does not treat inherited keys as stored overrides', async () => {
    expect(await store.getOverride('toString')).toBeUndefined()
    expect(await store.deleteOverride('constructor')).toBe(false)
  })

  it('merges category patches', async () => {
    expect(await store.setSortSettings({ method: 'ports_desc' })).toEqual({ method: 'ports_desc', groupByStatus: true })
    expect(await store.setDiskSettings({ showMounted: false })).toEqual({ showSystem: true, showMounted: false })
    expect((await store.setUiSettings({ fontSizeBase: 18 })).fontSizeBase).toBe(18)
    expect((await store.getUiSettings()).background).toBe('#1a1a1a')
  })

  it('cleans favorites before saving them', async () => {
    const saved = await store.setFavorites([
      { name: '  Router ', url: '192.168.1.1', icon: '' },
      { name: 'Empty', url: '   ', icon: '⭐' },
      { name: 'Docs', url: 'https://docs.lan', icon: '📚' },
    ])
    expect(saved).toEqual([
      { name: 'Router', url: 'http://192.168.1.1', icon: '🌐' },
      { name: 'Docs', url: 'https://docs.lan', icon: '📚' },
    ])
    expect(await store.getFavorites()).toEqual(saved)
  })

  it('serializes concurrent updates', async () => {
    await Promise.all(
      ['a', 'b', 'c', 'd', 'e'].map((id) => store.setOverride(id, { customName: id.toUpperCase() }))
    )
    expect(Object.keys(await store.listOverrides()).sort()).toEqual(['a', 'b', 'c', 'd', 'e'])
  })

  it('fills missing fields of a stored document', async () => {
    await fs.mkdir(path.dirname(file), { recursive: true })
    await fs.writeFile(
      file,
      JSON.stringify({
        settingsVersion: SETTINGS_VERSION,
        containers: { abc: { customName: 'Kept', visible: 'yes' } },
        sortSettings: { method: 'sideways' },
      })
    )

    expect(await store.getOverride('abc')).toEqual({ visible: true, customName: 'Kept', customUrl: '', icon: '🐳' })
    expect(await store.getSortSettings()).toEqual(DEFAULT_SORT_SETTINGS)
  })

  it('migrates a legacy document and saves it', async () => {
    await fs.mkdir(path.dirname(file), { recursive: true })
    await fs.writeFile(
      file,
      JSON.stringify({
        containers: { abc: { visible: false, custom_name: 'Old', custom_url: 'http://old.lan', icon: '📦' } },
        sort_settings: { method: 'ports_asc', group_by_status: false },
        disk_settings: { show_system: false },
        ui_settings: { font_size_base: '16' },
      })
    )

    expect(await store.getOverride('abc')).toEqual({
      visible: false,
      customName: 'Old',
      customUrl: 'http://old.lan',
      icon: '📦',
    })
    expect(await store.getSortSettings()).toEqual({ method: 'ports_asc', groupByStatus: false })
    expect(await store.getDiskSettings()).toEqual({ showSystem: false, showMounted: true })
    expect((await store.getUiSettings()).fontSizeBase).toBe(16)
    expect(await readFile()).toMatchObject({ settingsVersion: SETTINGS_VERSION })
  })

  it('raises SettingsReadError for a damaged document and leaves it alone', async () => {
    await fs.mkdir(path.dirname(file), { recursive: true })
    await fs.writeFile(file, '{ not json')

    await expect(store.getSortSettings()).rejects.toBeInstanceOf(SettingsReadError)
    await expect(store.setOverride('abc', {})).rejects.toBeInstanceOf(SettingsReadError)
    expect(await fs.readFile(file, 'utf-8')).toBe('{ not json')
  })

  it('keeps working after a failed operation', async () => {
    await fs.mkdir(path.dirname(file), { recursive: true })
    await fs.writeFile(file, '{ not json')
    await expect(store.getFavorites()).rejects.toBeInstanceOf(SettingsReadError)

    await fs.rm(file)
    expect(await store.getFavorites()).toEqual([])
  })

  describe('when the file cannot be written', () => {
    beforeEach(async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {})
      // A directory where the temp file goes makes every save fail
      await fs.mkdir(`${file}.${process.pid}.tmp`, { recursive: true })
    })

    it('serves defaults for a missing document', async () => {
      expect(await store.getSortSettings()).toEqual(DEFAULT_SORT_SETTINGS)
      expect(await store.getOverride('abc')).toBeUndefined()
      expect(console.warn).toHaveBeenCalled()
      await expect(fs.access(file)).rejects.toThrow()
    })

    it('serves a migrated legacy document from memory', async () => {
      const legacy = JSON.stringify({ sort_settings: { method: 'name_desc' } })
      await fs.writeFile(file, legacy)

      expect(await store.getSortSettings()).toEqual({ method: 'name_desc', groupByStatus: true })
      expect(await fs.readFile(file, 'utf-8')).toBe(legacy)
    })

    it('still reports failed updates', async () => {
      await expect(store.setOverride('abc', { customName: 'Wiki' })).rejects.toBeInstanceOf(SettingsWriteError)
    })
  })
})
