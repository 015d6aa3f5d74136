import { afterEach, describe, expect, it, vi } from 'vitest'
import { withTimeout } from './timeout'

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('resolves with the wrapped value', async () => {
    expect(await withTimeout(Promise.resolve(42), 1000, 'answer')).toBe(42)
  })

  it('rejects when the operation takes too long', async () => {
    vi.useFakeTimers()
    const pending = withTimeout(new Promise<never>(() => {}), 500, 'docker ping')
    const assertion = expect(pending).rejects.toThrow('docker ping timed out after 500ms')
    await vi.advanceTimersByTimeAsync(500)
    await assertion
  })
})
