import type { RawContainer } from '../../src/types'

/**
 * Where discovery gets its containers from.
 *
 * Implementations bound their own calls with a timeout and reject with
 * ContainerSourceUnavailableError when the runtime cannot be reached.
 */
export interface ContainerSource {
  listContainers(includeStopped: boolean): Promise<RawContainer[]>
}
