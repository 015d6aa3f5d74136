import { create } from 'zustand'
import type { HostOverview, ServicesUpdate } from '../types'

interface SocketState {
  connected: boolean
  connectionError: string | null

  // Latest server pushes; null until the first one arrives
  services: ServicesUpdate | null
  overview: HostOverview | null

  setConnected: (connected: boolean) => void
  setConnectionError: (error: string | null) => void
  setServices: (update: ServicesUpdate) => void
  setOverview: (overview: HostOverview) => void
  clearStaleData: () => void
}

export const useSocketStore = create<SocketState>((set) => ({
  connected: false,
  connectionError: null,
  services: null,
  overview: null,

  setConnected: (connected) => set({ connected }),
  setConnectionError: (connectionError) => set({ connectionError }),
  setServices: (services) => set({ services }),
  setOverview: (overview) => set({ overview }),

  // Pushed data goes stale while disconnected; queries take over until reconnect
  clearStaleData: () => set({ services: null, overview: null }),
}))
