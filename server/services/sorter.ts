import { SORT_METHODS } from '../../src/types'
import type { Service, SortMethod, SortSettings } from '../../src/types'

type Comparator = (a: Service, b: Service) => number

function compareNames(a: Service, b: Service): number {
  const left = a.displayName.toLowerCase()
  const right = b.displayName.toLowerCase()
  if (left < right) return -1
  if (left > right) return 1
  return 0
}

function maxPort(service: Service): number {
  return service.ports.length > 0 ? Math.max(...service.ports) : 0
}

function comparePorts(a: Service, b: Service): number {
  return maxPort(a) - maxPort(b)
}

// Array.prototype.sort is stable, so negating keeps ties in input order
const comparators: Record<SortMethod, Comparator> = {
  name_asc: compareNames,
  name_desc: (a, b) => compareNames(b, a),
  ports_asc: comparePorts,
  ports_desc: (a, b) => comparePorts(b, a),
}

export function toSortMethod(method: string): SortMethod {
  return SORT_METHODS.find((known) => known === method) ?? 'name_asc'
}

/**
 * Order services for display. Returns a new array.
 *
 * With `groupByStatus`, running services come first and each group is sorted
 * on its own. Unknown methods fall back to `name_asc`.
 */
export function sortServices(services: readonly Service[], settings: SortSettings): Service[] {
  const compare = comparators[toSortMethod(settings.method)]

  if (!settings.groupByStatus) {
    return [...services].sort(compare)
  }

  const running = services.filter((s) => s.status === 'running')
  const stopped = services.filter((s) => s.status !== 'running')
  return [...running.sort(compare), ...stopped.sort(compare)]
}
