import type {
  ContainerOverride,
  RawContainer,
  Service,
} from '../../src/types'

export const DEFAULT_ICON = '🐳'

// Container labels the dashboard reads
export const LABELS = {
  name: 'dashboard.name',
  icon: 'dashboard.icon',
  composeProject: 'com.docker.compose.project',
  composeService: 'com.docker.compose.service',
} as const

// Compose service names too generic to identify an application on their own
const GENERIC_COMPOSE_SERVICES: ReadonlySet<string> = new Set(['web', 'app', 'server'])

// Host ports outside this range are not treated as web UIs
const MIN_WEB_PORT = 80
const MAX_WEB_PORT = 9999

export type NormalizeOutcome =
  | {
      status: 'ok'
      service: Service
      override: ContainerOverride
      overrideCreated: boolean
    }
  | {
      status: 'skip'
      containerId: string
      containerName: string
      reason: string
    }

export function defaultOverride(): ContainerOverride {
  return {
    visible: true,
    customName: '',
    customUrl: '',
    icon: DEFAULT_ICON,
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Host ports published by a container that look like web UIs, ascending.
 * Returns null when the port map itself is unreadable.
 */
export function extractWebPorts(portBindings: unknown): number[] | null {
  if (portBindings === null || portBindings === undefined) return []
  if (!isRecord(portBindings)) return null

  const ports = new Set<number>()
  for (const bindings of Object.values(portBindings)) {
    if (!Array.isArray(bindings)) continue

    for (const binding of bindings) {
      if (!isRecord(binding)) continue
      const hostPort = binding.HostPort
      if (typeof hostPort !== 'string' || !/^\d+$/.test(hostPort)) continue

      const port = parseInt(hostPort, 10)
      if (port >= MIN_WEB_PORT && port <= MAX_WEB_PORT) {
        ports.add(port)
      }
    }
  }

  return [...ports].sort((a, b) => a - b)
}

/**
 * Name shown on the tile when the user has not set one.
 */
export function resolveLabelName(containerName: string, labels: Record<string, string>): string {
  // A present label wins even when empty
  if (Object.hasOwn(labels, LABELS.name)) return labels[LABELS.name]

  const project = labels[LABELS.composeProject]
  const service = labels[LABELS.composeService]
  if (project && service) {
    return GENERIC_COMPOSE_SERVICES.has(service) ? project : service
  }

  return containerName
}

export function buildAutoUrl(hostIp: string, ports: number[]): string {
  return ports.length > 0 ? `http://${hostIp}:${ports[0]}` : ''
}

/**
 * Merge a raw container with its stored override into a Service.
 *
 * Performs no I/O. When the override is missing a default one is created and
 * reported through `overrideCreated`; persisting it is up to the caller.
 */
export function normalizeContainer(
  raw: RawContainer,
  storedOverride: ContainerOverride | undefined,
  hostIp: string
): NormalizeOutcome {
  if (!raw.id) {
    return { status: 'skip', containerId: '', containerName: raw.name, reason: 'container has no id' }
  }

  const ports = extractWebPorts(raw.portBindings)
  if (ports === null) {
    return {
      status: 'skip',
      containerId: raw.id,
      containerName: raw.name,
      reason: 'unreadable port map',
    }
  }

  const override = storedOverride ?? defaultOverride()
  const displayName = override.customName || resolveLabelName(raw.name, raw.labels)
  const autoUrl = buildAutoUrl(hostIp, ports)
  const customUrl = override.customUrl

  return {
    status: 'ok',
    override,
    overrideCreated: storedOverride === undefined,
    service: {
      id: raw.id,
      displayName,
      url: customUrl || autoUrl,
      autoUrl,
      customUrl,
      hasCustomUrl: customUrl !== '',
      icon: override.icon || DEFAULT_ICON,
      ports,
      status: raw.status,
      image: raw.imageTag,
      visible: override.visible,
      containerName: raw.name,
    },
  }
}
