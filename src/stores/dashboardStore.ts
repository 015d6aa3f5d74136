import { create } from 'zustand'

export type DashboardView = 'dashboard' | 'settings'

interface DashboardState {
  view: DashboardView
  // Service whose override is open in the editor dialog
  editingServiceId: string | null
  setView: (view: DashboardView) => void
  openEditor: (serviceId: string) => void
  closeEditor: () => void
}

export const useDashboardStore = create<DashboardState>((set) => ({
  view: 'dashboard',
  editingServiceId: null,
  setView: (view) => set({ view, editingServiceId: null }),
  openEditor: (serviceId) => set({ editingServiceId: serviceId }),
  closeEditor: () => set({ editingServiceId: null }),
}))
