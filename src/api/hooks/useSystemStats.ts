import { useQuery } from '@tanstack/react-query'
import { api } from '../client'
import type { DiskView, HostOverview } from '../../types'
import { useSocketStore } from '../../stores/socketStore'

/**
 * Host figures and container counts. Prefers socket-pushed data and
 * falls back to polling while the socket is down.
 */
export function useHostOverview() {
  const pushed = useSocketStore((state) => state.overview)
  const isConnected = useSocketStore((state) => state.connected)

  const query = useQuery<HostOverview, Error>({
    queryKey: ['system', 'stats'],
    queryFn: () => api.get<HostOverview>('/system/stats'),
    refetchInterval: isConnected && pushed ? false : 5000,
    refetchOnWindowFocus: !isConnected,
  })

  return {
    ...query,
    data: pushed ?? query.data,
    isLoading: query.isLoading && !pushed,
  }
}

export function useDisks() {
  return useQuery<DiskView[], Error>({
    queryKey: ['system', 'disks'],
    queryFn: () => api.get<DiskView[]>('/system/disks'),
    refetchInterval: 30000,
  })
}

export function useConnectionStatus() {
  const connected = useSocketStore((state) => state.connected)
  const error = useSocketStore((state) => state.connectionError)

  return {
    connected,
    error,
  }
}
