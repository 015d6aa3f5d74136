import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ContainerSourceUnavailableError } from '../errors'
import { FakeContainerSource, InMemorySettingsStore, rawContainer } from '../testing/fakes'
import { JsonSettingsStore } from './JsonSettingsStore'
import { defaultOverride } from './normalizer'
import { ServiceDiscovery } from './ServiceDiscovery'

const WEB_ID = 'aaaaaaaaaaaa'
const DB_ID = 'bbbbbbbbbbbb'
const HIDDEN_ID = 'cccccccccccc'

function hostContainers(): FakeContainerSource {
  return new FakeContainerSource([
    rawContainer({ id: WEB_ID, name: 'wiki', portBindings: { '80/tcp': [{ HostPort: '8080' }] } }),
    rawContainer({ id: DB_ID, name: 'db', status: 'exited', portBindings: {} }),
    rawContainer({ id: HIDDEN_ID, name: 'agent', portBindings: { '9001/tcp': [{ HostPort: '9001' }] } }),
  ])
}

describe('ServiceDiscovery', () => {
  let source: FakeContainerSource
  let store: InMemorySettingsStore
  let discovery: ServiceDiscovery

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})

    source = hostContainers()
    store = new InMemorySettingsStore()
    store.doc.containers[HIDDEN_ID] = { ...defaultOverride(), visible: false }
    discovery = new ServiceDiscovery({
      source,
      store,
      resolveHostIp: async () => '10.0.0.2',
    })
  })

  it('lists visible services for the dashboard, running first', async () => {
    const services = await discovery.listForDashboard()
    expect(services.map((s) => s.containerName)).toEqual(['wiki', 'db'])
    expect(services[0]?.url).toBe('http://10.0.0.2:8080')
  })

  it('lists hidden services for the settings page', async () => {
    const services = await discovery.listForAdmin()
    expect(services.map((s) => s.containerName)).toEqual(['agent', 'wiki', 'db'])
    expect(services[0]?.visible).toBe(false)
  })

  it('persists default overrides for containers seen the first time', async () => {
    await discovery.discover('dashboard')
    expect(store.doc.containers[WEB_ID]).toEqual(defaultOverride())
    expect(store.doc.containers[DB_ID]).toEqual(defaultOverride())
    expect(store.writeCount).toBe(2)
  })

  it('does not rewrite overrides that already exist', async () => {
    await discovery.discover('dashboard')
    await discovery.discover('dashboard')
    expect(store.writeCount).toBe(2)
  })

  it('returns the same list on repeated calls', async () => {
    await discovery.listForDashboard()
    const first = await discovery.listForDashboard()
    const second = await discovery.listForDashboard()
    expect(second).toEqual(first)
    expect(first.map((s) => s.containerName)).toEqual(['wiki', 'db'])
  })

  it('applies the stored sort settings', async () => {
    store.doc.sortSettings = { method: 'name_desc', groupByStatus: false }
    const services = await discovery.listForAdmin()
    expect(services.map((s) => s.containerName)).toEqual(['wiki', 'db', 'agent'])
  })

  it('reports an unavailable source as an empty, degraded result', async () => {
    source.failure = new ContainerSourceUnavailableError('Docker is not reachable')
    expect(await discovery.discover('dashboard')).toEqual({
      services: [],
      sourceAvailable: false,
      skipped: [],
    })
  })

  it('propagates unexpected source errors', async () => {
    source.failure = new TypeError('bug')
    await expect(discovery.discover('dashboard')).rejects.toThrow('bug')
  })

  it('still lists services when defaults cannot be saved', async () => {
    store.failWrites = true
    const services = await discovery.listForDashboard()
    expect(services.map((s) => s.containerName)).toEqual(['wiki', 'db'])
    expect(store.doc.containers[WEB_ID]).toBeUndefined()
  })

  it('uses defaults without writing when settings cannot be read', async () => {
    store.failReads = true
    const services = await discovery.listForAdmin()
    // Hidden override unreadable, so every service is visible and name sorted
    expect(services.map((s) => s.containerName)).toEqual(['agent', 'wiki', 'db'])
    expect(services.every((s) => s.visible)).toBe(true)
    expect(store.writeCount).toBe(0)
  })

  it('skips containers it cannot normalize and reports them', async () => {
    source.containers.push(rawContainer({ id: 'dddddddddddd', name: 'broken', portBindings: 'garbage' }))
    const result = await discovery.discover('admin')
    expect(result.services).toHaveLength(3)
    expect(result.skipped).toEqual([
      { containerId: 'dddddddddddd', containerName: 'broken', reason: 'unreadable port map' },
    ])
    expect(store.doc.containers['dddddddddddd']).toBeUndefined()
  })
})

describe('ServiceDiscovery with the JSON settings file', () => {
  let dir: string
  let file: string
  let store: JsonSettingsStore
  let discovery: ServiceDiscovery

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'dockboard-discovery-'))
    file = path.join(dir, 'settings.json')
    store = new JsonSettingsStore(file)
    discovery = new ServiceDiscovery({
      source: hostContainers(),
      store,
      resolveHostIp: async () => '10.0.0.2',
    })
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it('stores defaults for new containers and honors hidden ones', async () => {
    expect((await discovery.listForDashboard()).map((s) => s.containerName)).toEqual(['agent', 'wiki', 'db'])
    expect(await store.getOverride(WEB_ID)).toEqual(defaultOverride())

    await store.hideService(HIDDEN_ID)
    expect((await discovery.listForDashboard()).map((s) => s.containerName)).toEqual(['wiki', 'db'])
    expect((await discovery.listForAdmin()).map((s) => s.containerName)).toEqual(['agent', 'wiki', 'db'])
  })

  it('returns the same list on repeated calls', async () => {
    await discovery.listForDashboard()
    expect(await discovery.listForDashboard()).toEqual(await discovery.listForDashboard())
  })

  it('lists services when the settings file cannot be written', async () => {
    // A directory where the temp file goes makes every save fail
    await fs.mkdir(`${file}.${process.pid}.tmp`)

    const result = await discovery.discover('dashboard')
    expect(result.sourceAvailable).toBe(true)
    expect(result.services.map((s) => s.containerName)).toEqual(['agent', 'wiki', 'db'])
    await expect(fs.access(file)).rejects.toThrow()
  })
})
