import { memo } from 'react'
import { motion, AnimatePresence } from 'framer-motion'
import { useToastStore, type ToastType } from '../../stores/toastStore'

const toastStyles: Record<ToastType, string> = {
  success: 'bg-signal-green/20 border-signal-green/50 text-signal-green',
  error: 'bg-signal-red/20 border-signal-red/50 text-signal-red',
  info: 'bg-signal-blue/20 border-signal-blue/50 text-signal-blue',
}

const toastIcons: Record<ToastType, string> = {
  success: '✓',
  error: '✕',
  info: 'ℹ',
}

export const ToastContainer = memo(function ToastContainer() {
  const toasts = useToastStore((state) => state.toasts)
  const removeToast = useToastStore((state) => state.removeToast)

  return (
    <div className="fixed bottom-12 right-4 z-50 space-y-2" role="status" aria-live="polite">
      <AnimatePresence mode="popLayout">
        {toasts.map((toast) => (
          <motion.div
            key={toast.id}
            initial={{ opacity: 0, y: 20 }}
            animate={{ opacity: 1, y: 0 }}
            exit={{ opacity: 0, x: 60 }}
            transition={{ duration: 0.2 }}
            className={`flex items-center gap-2 px-4 py-2 rounded-tile border shadow-lg bg-dock-panel ${toastStyles[toast.type]}`}
          >
            <span>{toastIcons[toast.type]}</span>
            <span className="dock-small">{toast.message}</span>
            <button
              type="button"
              onClick={() => removeToast(toast.id)}
              className="ml-2 opacity-60 hover:opacity-100"
              aria-label="Dismiss"
            >
              ×
            </button>
          </motion.div>
        ))}
      </AnimatePresence>
    </div>
  )
})
