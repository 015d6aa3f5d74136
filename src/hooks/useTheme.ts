import { useEffect } from 'react'
import type { UiSettings } from '../types'

/**
 * CSS variables the stylesheet and Tailwind colors read
 */
export function themeVariables(settings: UiSettings): Record<string, string> {
  return {
    '--dock-bg': settings.background,
    '--dock-panel': settings.cardBackground,
    '--dock-text': settings.textColor,
    '--dock-accent': settings.accentColor,
    '--dock-border': settings.borderColor,
    '--dock-radius': `${settings.borderRadius}px`,
    '--dock-font-base': `${settings.fontSizeBase}px`,
    '--dock-font-large': `${settings.fontSizeLarge}px`,
    '--dock-font-small': `${settings.fontSizeSmall}px`,
  }
}

export function useTheme(settings: UiSettings | undefined) {
  useEffect(() => {
    if (!settings) return
    const root = document.documentElement
    for (const [name, value] of Object.entries(themeVariables(settings))) {
      root.style.setProperty(name, value)
    }
  }, [settings])
}
