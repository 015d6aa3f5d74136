import { create } from 'zustand'

export type ToastType = 'success' | 'error' | 'info'

export interface Toast {
  id: string
  message: string
  type: ToastType
  duration?: number
}

interface ToastState {
  toasts: Toast[]
  addToast: (toast: Omit<Toast, 'id'>) => void
  removeToast: (id: string) => void
  clearToasts: () => void
}

const MAX_TOASTS = 4
const DEFAULT_DURATION: Record<ToastType, number> = {
  success: 3000,
  info: 3000,
  error: 6000,
}

let toastId = 0

// Pending auto-dismiss timers, cleared on manual dismiss
const timeoutIds = new Map<string, ReturnType<typeof setTimeout>>()

function cancelTimer(id: string) {
  const timeoutId = timeoutIds.get(id)
  if (timeoutId) {
    clearTimeout(timeoutId)
    timeoutIds.delete(id)
  }
}

export const useToastStore = create<ToastState>((set, get) => ({
  toasts: [],

  addToast: (toast) => {
    // A failing poll would otherwise stack the same message
    const duplicate = get().toasts.find((t) => t.type === toast.type && t.message === toast.message)
    if (duplicate) return

    const id = `toast-${++toastId}`
    const duration = toast.duration ?? DEFAULT_DURATION[toast.type]

    set((state) => {
      const toasts = [...state.toasts, { ...toast, id }]
      const dropped = toasts.slice(0, Math.max(0, toasts.length - MAX_TOASTS))
      dropped.forEach((t) => cancelTimer(t.id))
      return { toasts: toasts.slice(-MAX_TOASTS) }
    })

    if (duration > 0) {
      timeoutIds.set(
        id,
        setTimeout(() => {
          timeoutIds.delete(id)
          set((state) => ({ toasts: state.toasts.filter((t) => t.id !== id) }))
        }, duration)
      )
    }
  },

  removeToast: (id) => {
    cancelTimer(id)
    set((state) => ({ toasts: state.toasts.filter((t) => t.id !== id) }))
  },

  clearToasts: () => {
    get().toasts.forEach((t) => cancelTimer(t.id))
    set({ toasts: [] })
  },
}))

export const toast = {
  success: (message: string, duration?: number) =>
    useToastStore.getState().addToast({ message, type: 'success', duration }),
  error: (message: string, duration?: number) =>
    useToastStore.getState().addToast({ message, type: 'error', duration }),
  info: (message: string, duration?: number) =>
    useToastStore.getState().addToast({ message, type: 'info', duration }),
}
