import Docker from 'dockerode'
import { z } from 'zod'
import type {
  ActionResult,
  ContainerCounts,
  ContainerStatus,
  ContainerUsage,
  PortBinding,
  RawContainer,
} from '../../src/types'
import { config } from '../config'
import { ContainerSourceUnavailableError, errorMessage } from '../errors'
import { withTimeout } from '../utils/timeout'
import type { ContainerSource } from './ContainerSource'
import { DEFAULT_ICON, LABELS } from './normalizer'

const cpuSampleSchema = z.object({
  cpu_usage: z.object({ total_usage: z.number().catch(0) }).catch({ total_usage: 0 }),
  system_cpu_usage: z.number().optional().catch(undefined),
  online_cpus: z.number().optional().catch(undefined),
})

/**
 * The parts of a Docker stats sample used for usage figures. cgroup v1 and v2
 * hosts fill different fields, so everything is optional.
 */
const statsSampleSchema = z.object({
  cpu_stats: cpuSampleSchema,
  precpu_stats: cpuSampleSchema,
  memory_stats: z
    .object({ usage: z.number().optional(), limit: z.number().optional() })
    .catch({}),
  networks: z
    .record(z.object({ rx_bytes: z.number().catch(0), tx_bytes: z.number().catch(0) }))
    .optional()
    .catch(undefined),
  blkio_stats: z
    .object({
      io_service_bytes_recursive: z
        .array(z.object({ op: z.string(), value: z.number() }))
        .nullish(),
    })
    .optional()
    .catch(undefined),
  pids_stats: z.object({ current: z.number().optional() }).optional().catch(undefined),
})

export type StatsSample = z.infer<typeof statsSampleSchema>

export type UsageFigures = Omit<ContainerUsage, 'id' | 'name' | 'status' | 'icon'>

const round2 = (value: number) => Math.round(value * 100) / 100

/**
 * Turn a one-shot stats sample into percentages and byte counters
 */
export function computeUsage(stats: StatsSample): UsageFigures {
  // CPU percentage from the delta against the previous sample
  const cpuDelta =
    stats.cpu_stats.cpu_usage.total_usage - stats.precpu_stats.cpu_usage.total_usage
  const systemDelta =
    (stats.cpu_stats.system_cpu_usage ?? 0) - (stats.precpu_stats.system_cpu_usage ?? 0)
  const cpuCount = stats.cpu_stats.online_cpus || 1
  const cpuPercent = systemDelta > 0 && cpuDelta > 0 ? (cpuDelta / systemDelta) * cpuCount * 100 : 0

  const memUsed = stats.memory_stats.usage || 0
  const memLimit = stats.memory_stats.limit || 0
  const memPercent = memLimit > 0 ? (memUsed / memLimit) * 100 : 0

  let ioRead = 0
  let ioWrite = 0
  for (const entry of stats.blkio_stats?.io_service_bytes_recursive ?? []) {
    const op = entry.op.toLowerCase()
    if (op === 'read') ioRead += entry.value
    else if (op === 'write') ioWrite += entry.value
  }

  let networkRx = 0
  let networkTx = 0
  for (const net of Object.values(stats.networks ?? {})) {
    networkRx += net.rx_bytes || 0
    networkTx += net.tx_bytes || 0
  }

  return {
    cpu: round2(cpuPercent),
    memoryUsedMb: round2(memUsed / (1024 * 1024)),
    memoryPercent: round2(memPercent),
    ioRead,
    ioWrite,
    networkRx,
    networkTx,
    pids: stats.pids_stats?.current ?? 0,
  }
}

const EMPTY_USAGE: UsageFigures = {
  cpu: 0,
  memoryUsedMb: 0,
  memoryPercent: 0,
  ioRead: 0,
  ioWrite: 0,
  networkRx: 0,
  networkTx: 0,
  pids: 0,
}

/**
 * Parse container state to our status type
 */
export function parseStatus(state: string): ContainerStatus {
  const normalized = state.toLowerCase()
  if (normalized === 'running') return 'running'
  if (normalized === 'paused') return 'paused'
  if (normalized === 'created') return 'created'
  if (normalized === 'restarting') return 'restarting'
  if (normalized === 'removing') return 'removing'
  if (normalized === 'dead') return 'dead'
  return 'exited'
}

/**
 * Map a Docker list entry to the raw record discovery works on
 */
export function toRawContainer(info: Docker.ContainerInfo): RawContainer {
  const portBindings: Record<string, PortBinding[]> = {}
  for (const port of info.Ports ?? []) {
    const key = `${port.PrivatePort}/${port.Type || 'tcp'}`
    const bindings = portBindings[key] ?? []
    if (port.PublicPort) {
      bindings.push({ HostIp: port.IP, HostPort: String(port.PublicPort) })
    }
    portBindings[key] = bindings
  }

  return {
    id: info.Id,
    name: info.Names[0]?.replace(/^\//, '') || info.Id.substring(0, 12),
    status: parseStatus(info.State),
    labels: info.Labels ?? {},
    portBindings,
    imageTag: info.Image && !info.Image.startsWith('sha256:') ? info.Image : 'unknown',
  }
}

export class ContainerManager implements ContainerSource {
  private docker: Docker

  constructor(
    socketPath = config.docker.socketPath,
    private readonly timeoutMs = config.docker.timeoutMs
  ) {
    this.docker = new Docker({ socketPath })
  }

  /**
   * Test Docker connection
   */
  async ping(): Promise<boolean> {
    try {
      await withTimeout(this.docker.ping(), this.timeoutMs, 'docker ping')
      return true
    } catch (error) {
      console.error('[docker] Ping failed:', errorMessage(error))
      return false
    }
  }

  async listContainers(includeStopped: boolean): Promise<RawContainer[]> {
    let containers: Docker.ContainerInfo[]
    try {
      containers = await withTimeout(
        this.docker.listContainers({ all: includeStopped }),
        this.timeoutMs,
        'docker listContainers'
      )
    } catch (error) {
      throw new ContainerSourceUnavailableError(
        `Docker is not reachable: ${errorMessage(error)}`,
        { cause: error }
      )
    }
    return containers.map(toRawContainer)
  }

  /**
   * Running/stopped totals; zeros when Docker cannot be reached
   */
  async getCounts(): Promise<ContainerCounts> {
    try {
      const containers = await this.listContainers(true)
      const running = containers.filter((c) => c.status === 'running').length
      return { total: containers.length, running, stopped: containers.length - running }
    } catch (error) {
      console.error('[docker] Cannot count containers:', errorMessage(error))
      return { total: 0, running: 0, stopped: 0 }
    }
  }

  /**
   * Resource usage of every container. A container whose stats cannot be
   * read is still listed, with zeroed figures.
   */
  async getUsage(): Promise<ContainerUsage[]> {
    let containers: RawContainer[]
    try {
      containers = await this.listContainers(true)
    } catch (error) {
      console.error('[docker] Cannot list containers for stats:', errorMessage(error))
      return []
    }

    return Promise.all(
      containers.map(async (container): Promise<ContainerUsage> => {
        const base = {
          id: container.id,
          name: container.name,
          status: container.status,
          icon: container.labels[LABELS.icon] || DEFAULT_ICON,
        }
        if (container.status !== 'running') {
          return { ...base, ...EMPTY_USAGE }
        }
        try {
          const stats: unknown = await withTimeout(
            this.docker.getContainer(container.id).stats({ stream: false }),
            this.timeoutMs,
            `docker stats ${container.name}`
          )
          const sample = statsSampleSchema.safeParse(stats)
          if (!sample.success) {
            console.warn(`[docker] Unexpected stats payload for ${container.name}`)
            return { ...base, ...EMPTY_USAGE }
          }
          return { ...base, ...computeUsage(sample.data) }
        } catch (error) {
          console.warn(`[docker] Stats unavailable for ${container.name}:`, errorMessage(error))
          return { ...base, ...EMPTY_USAGE }
        }
      })
    )
  }

  startContainer(id: string): Promise<ActionResult> {
    return this.runAction(id, 'start', (c) => c.start())
  }

  stopContainer(id: string): Promise<ActionResult> {
    return this.runAction(id, 'stop', (c) => c.stop())
  }

  restartContainer(id: string): Promise<ActionResult> {
    return this.runAction(id, 'restart', (c) => c.restart())
  }

  private async runAction(
    id: string,
    action: string,
    run: (container: Docker.Container) => Promise<unknown>
  ): Promise<ActionResult> {
    try {
      await run(this.docker.getContainer(id))
      console.log(`[docker] ${action} ${id.substring(0, 12)}`)
      return { success: true }
    } catch (error) {
      // 304: already in the requested state
      if (typeof error === 'object' && error !== null && 'statusCode' in error && error.statusCode === 304) {
        return { success: true }
      }
      console.error(`[docker] Failed to ${action} ${id.substring(0, 12)}:`, errorMessage(error))
      return { success: false, error: errorMessage(error) }
    }
  }
}

// Export singleton instance
export const containerManager = new ContainerManager()
