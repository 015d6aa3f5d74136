import { useCallback, useEffect, useRef, type KeyboardEvent as ReactKeyboardEvent } from 'react'

const FOCUSABLE =
  'button:not([disabled]), [href], input:not([disabled]), select:not([disabled]), textarea:not([disabled]), [tabindex]:not([tabindex="-1"])'

function focusable(container: HTMLElement): HTMLElement[] {
  return Array.from(container.querySelectorAll<HTMLElement>(FOCUSABLE))
}

/**
 * Escape closes the dialog and Tab stays inside it. Focus returns to the
 * element that opened it.
 */
export function useDialog<T extends HTMLElement>(isOpen: boolean, onClose: () => void) {
  const containerRef = useRef<T>(null)
  const opener = useRef<Element | null>(null)

  useEffect(() => {
    if (!isOpen) return

    opener.current = document.activeElement
    const container = containerRef.current
    if (container) {
      focusable(container)[0]?.focus()
    }

    const handleEscape = (e: KeyboardEvent) => {
      if (e.key === 'Escape') {
        e.preventDefault()
        onClose()
      }
    }
    document.addEventListener('keydown', handleEscape)

    return () => {
      document.removeEventListener('keydown', handleEscape)
      if (opener.current instanceof HTMLElement) {
        opener.current.focus()
      }
    }
  }, [isOpen, onClose])

  const handleKeyDown = useCallback((e: ReactKeyboardEvent) => {
    if (e.key !== 'Tab') return

    const container = containerRef.current
    if (!container) return

    const elements = focusable(container)
    const first = elements[0]
    const last = elements[elements.length - 1]
    if (!first || !last) return

    if (e.shiftKey && document.activeElement === first) {
      e.preventDefault()
      last.focus()
    } else if (!e.shiftKey && document.activeElement === last) {
      e.preventDefault()
      first.focus()
    }
  }, [])

  return { containerRef, handleKeyDown }
}
