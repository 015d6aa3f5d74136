export function formatBytes(bytes: number): string {
  const gb = bytes / (1024 * 1024 * 1024)
  if (gb >= 1) return `${gb.toFixed(1)}GB`
  const mb = bytes / (1024 * 1024)
  if (mb >= 1) return `${mb.toFixed(0)}MB`
  const kb = bytes / 1024
  if (kb >= 1) return `${kb.toFixed(0)}KB`
  return `${bytes}B`
}

export function formatUptime(seconds: number): string {
  const days = Math.floor(seconds / 86400)
  const hours = Math.floor((seconds % 86400) / 3600)
  const minutes = Math.floor((seconds % 3600) / 60)

  if (days > 0) return `${days}d ${hours}h`
  if (hours > 0) return `${hours}h ${minutes}m`
  return `${minutes}m`
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`
}

/**
 * Progress bar color for a usage percentage
 */
export function usageColor(percent: number): string {
  if (percent > 90) return 'bg-signal-red'
  if (percent > 80) return 'bg-signal-yellow'
  return 'bg-dock-accent'
}

export function clampPercent(value: number): number {
  return Math.min(100, Math.max(0, value))
}
