import { describe, expect, it } from 'vitest'
import { clampPercent, formatBytes, formatPercent, formatUptime, usageColor } from './format'

describe('formatBytes', () => {
  it('picks the largest whole unit', () => {
    expect(formatBytes(3.5 * 1024 ** 3)).toBe('3.5GB')
    expect(formatBytes(512 * 1024 ** 2)).toBe('512MB')
    expect(formatBytes(2048)).toBe('2KB')
    expect(formatBytes(100)).toBe('100B')
  })
})

describe('formatUptime', () => {
  it('shows days and hours for long uptimes', () => {
    expect(formatUptime(2 * 86400 + 5 * 3600 + 59)).toBe('2d 5h')
  })

  it('shows hours and minutes', () => {
    expect(formatUptime(3 * 3600 + 15 * 60)).toBe('3h 15m')
  })

  it('shows minutes only', () => {
    expect(formatUptime(59)).toBe('0m')
  })
})

describe('formatPercent', () => {
  it('keeps one decimal', () => {
    expect(formatPercent(12.345)).toBe('12.3%')
  })
})

describe('usageColor', () => {
  it('turns yellow above 80 and red above 90', () => {
    expect(usageColor(80)).toBe('bg-dock-accent')
    expect(usageColor(85)).toBe('bg-signal-yellow')
    expect(usageColor(95)).toBe('bg-signal-red')
  })
})

describe('clampPercent', () => {
  it('keeps values between 0 and 100', () => {
    expect(clampPercent(-3)).toBe(0)
    expect(clampPercent(140)).toBe(100)
    expect(clampPercent(42)).toBe(42)
  })
})
