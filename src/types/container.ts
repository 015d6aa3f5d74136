// Container types shared by the server and the dashboard

export type ContainerStatus =
  | 'running'
  | 'paused'
  | 'exited'
  | 'created'
  | 'restarting'
  | 'removing'
  | 'dead'

/**
 * One host binding of a container port, in the shape Docker reports it.
 */
export interface PortBinding {
  HostIp?: string
  HostPort?: string
}

/**
 * A container as reported by the container runtime.
 */
export interface RawContainer {
  id: string
  name: string         // Container name (without leading /)
  status: ContainerStatus
  labels: Record<string, string>
  /**
   * Container port (e.g. "80/tcp") to host bindings. Comes straight from the
   * runtime and is validated during normalization.
   */
  portBindings: unknown
  imageTag: string     // "unknown" when the image carries no tag
}

export interface ContainerCounts {
  total: number
  running: number
  stopped: number
}

export interface ContainerUsage {
  id: string
  name: string
  status: ContainerStatus
  icon: string
  cpu: number           // CPU percentage
  memoryUsedMb: number
  memoryPercent: number
  ioRead: number        // bytes
  ioWrite: number       // bytes
  networkRx: number     // bytes
  networkTx: number     // bytes
  pids: number
}

export interface ActionResult {
  success: boolean
  error?: string
}
