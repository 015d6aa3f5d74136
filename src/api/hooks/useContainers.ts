import { useQuery, useMutation, useQueryClient } from '@tanstack/react-query'
import { api } from '../client'
import type { ContainerUsage } from '../../types'
import { useSocketStore } from '../../stores/socketStore'
import { toast } from '../../stores/toastStore'

export function useContainerUsage(enabled = true) {
  return useQuery<ContainerUsage[], Error>({
    queryKey: ['containers', 'stats'],
    queryFn: () => api.get<ContainerUsage[]>('/containers/stats'),
    refetchInterval: 5000,
    enabled,
  })
}

type ContainerAction = 'start' | 'stop' | 'restart'

const pastTense: Record<ContainerAction, string> = {
  start: 'started',
  stop: 'stopped',
  restart: 'restarted',
}

/**
 * Start, stop and restart for one container
 */
export function useContainerActions(containerId: string) {
  const queryClient = useQueryClient()

  const useAction = (action: ContainerAction) =>
    useMutation({
      mutationFn: () => api.post(`/containers/${containerId}/${action}`, {}),
      onSuccess: () => {
        useSocketStore.getState().clearStaleData()
        void queryClient.invalidateQueries({ queryKey: ['containers'] })
        void queryClient.invalidateQueries({ queryKey: ['services'] })
        toast.success(`Container ${pastTense[action]}`)
      },
      onError: (error: Error) => {
        toast.error(`Failed to ${action} container: ${error.message}`)
      },
    })

  return {
    start: useAction('start'),
    stop: useAction('stop'),
    restart: useAction('restart'),
  }
}
