import { useMutation, useQuery, useQueryClient } from '@tanstack/react-query'
import { api } from '../client'
import type { ContainerOverride, Service, ServicesUpdate } from '../../types'
import { useSocketStore } from '../../stores/socketStore'
import { toast } from '../../stores/toastStore'

export const DEGRADED_HEADER = 'x-discovery-degraded'

async function fetchServices(endpoint: string): Promise<ServicesUpdate> {
  const { data, headers } = await api.getWithHeaders<Service[]>(endpoint)
  return { services: data, sourceAvailable: !headers.has(DEGRADED_HEADER) }
}

/**
 * Visible services for the dashboard. Prefers socket-pushed data and
 * falls back to polling while the socket is down.
 */
export function useServices() {
  const pushed = useSocketStore((state) => state.services)
  const isConnected = useSocketStore((state) => state.connected)

  const query = useQuery<ServicesUpdate, Error>({
    queryKey: ['services', 'dashboard'],
    queryFn: () => fetchServices('/services'),
    refetchInterval: isConnected && pushed ? false : 10000,
    refetchOnWindowFocus: !isConnected,
  })

  return {
    ...query,
    data: pushed ?? query.data,
    isLoading: query.isLoading && !pushed,
  }
}

/**
 * Every service including hidden ones, for the settings page
 */
export function useAllServices() {
  return useQuery<ServicesUpdate, Error>({
    queryKey: ['services', 'all'],
    queryFn: () => fetchServices('/services/all'),
  })
}

export function useHideService() {
  const queryClient = useQueryClient()

  return useMutation({
    mutationFn: (service: Service) => api.post<ContainerOverride>(`/services/${service.id}/hide`, {}),
    onSuccess: (_override, service) => {
      useSocketStore.getState().clearStaleData()
      void queryClient.invalidateQueries({ queryKey: ['services'] })
      toast.success(`${service.displayName} hidden`)
    },
    onError: (error: Error) => {
      toast.error(`Failed to hide service: ${error.message}`)
    },
  })
}
