import { useMutation, useQuery, useQueryClient } from '@tanstack/react-query'
import { api } from '../client'
import type {
  ContainerOverride,
  DiskSettings,
  Favorite,
  SortSettings,
  UiSettings,
} from '../../types'
import { useSocketStore } from '../../stores/socketStore'
import { toast } from '../../stores/toastStore'

/**
 * Settings change what discovery returns, so pushed service lists are dropped
 * until the next push and the queries refetch.
 */
function useSettingsMutation<TVariables, TResult>(
  mutationFn: (variables: TVariables) => Promise<TResult>,
  settingsKey: string,
  successMessage?: string
) {
  const queryClient = useQueryClient()

  return useMutation({
    mutationFn,
    onSuccess: () => {
      useSocketStore.getState().clearStaleData()
      void queryClient.invalidateQueries({ queryKey: ['settings', settingsKey] })
      void queryClient.invalidateQueries({ queryKey: ['services'] })
      void queryClient.invalidateQueries({ queryKey: ['system', 'disks'] })
      if (successMessage) toast.success(successMessage)
    },
    onError: (error: Error) => {
      toast.error(`Failed to save settings: ${error.message}`)
    },
  })
}

export function useContainerOverrides() {
  return useQuery<Record<string, ContainerOverride>, Error>({
    queryKey: ['settings', 'containers'],
    queryFn: () => api.get<Record<string, ContainerOverride>>('/settings/containers'),
  })
}

export function useUpdateOverride() {
  return useSettingsMutation(
    ({ id, patch }: { id: string; patch: Partial<ContainerOverride> }) =>
      api.patch<ContainerOverride>(`/settings/containers/${id}`, patch),
    'containers',
    'Service settings saved'
  )
}

export function useResetOverride() {
  return useSettingsMutation(
    (id: string) => api.delete<{ success: boolean }>(`/settings/containers/${id}`),
    'containers',
    'Service settings reset'
  )
}

export function useSortSettings() {
  return useQuery<SortSettings, Error>({
    queryKey: ['settings', 'sort'],
    queryFn: () => api.get<SortSettings>('/settings/sort'),
  })
}

export function useUpdateSortSettings() {
  return useSettingsMutation(
    (patch: Partial<SortSettings>) => api.put<SortSettings>('/settings/sort', patch),
    'sort'
  )
}

export function useUiSettings() {
  return useQuery<UiSettings, Error>({
    queryKey: ['settings', 'ui'],
    queryFn: () => api.get<UiSettings>('/settings/ui'),
    staleTime: Infinity,
  })
}

export function useUpdateUiSettings() {
  return useSettingsMutation(
    (patch: Partial<UiSettings>) => api.put<UiSettings>('/settings/ui', patch),
    'ui',
    'Appearance saved'
  )
}

export function useDiskSettings() {
  return useQuery<DiskSettings, Error>({
    queryKey: ['settings', 'disks'],
    queryFn: () => api.get<DiskSettings>('/settings/disks'),
  })
}

export function useUpdateDiskSettings() {
  return useSettingsMutation(
    (patch: Partial<DiskSettings>) => api.put<DiskSettings>('/settings/disks', patch),
    'disks'
  )
}

export function useFavorites() {
  return useQuery<Favorite[], Error>({
    queryKey: ['settings', 'favorites'],
    queryFn: () => api.get<Favorite[]>('/settings/favorites'),
  })
}

export function useUpdateFavorites() {
  return useSettingsMutation(
    (favorites: Favorite[]) => api.put<Favorite[]>('/settings/favorites', { favorites }),
    'favorites',
    'Favorites saved'
  )
}
