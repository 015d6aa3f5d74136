import { beforeEach, describe, expect, it, vi } from 'vitest'
import { pickLocalIps, resolveHostIp, type InterfaceEntry } from './hostAddress'

function iface(ip4: string, internal: boolean, isDefault: boolean): InterfaceEntry {
  return { ip4, internal, default: isDefault }
}

describe('pickLocalIps', () => {
  it('lists external IPv4 addresses, the default interface first', () => {
    expect(
      pickLocalIps([
        iface('127.0.0.1', true, false),
        iface('172.17.0.1', false, false),
        iface('192.168.1.20', false, true),
        iface('', false, false),
        iface('172.17.0.1', false, false),
      ])
    ).toEqual(['192.168.1.20', '172.17.0.1'])
  })
})

describe('resolveHostIp', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  it('prefers the configured address', async () => {
    const lookup = vi.fn(async () => ['192.168.1.20'])
    expect(await resolveHostIp('10.1.1.1', lookup)).toBe('10.1.1.1')
    expect(lookup).not.toHaveBeenCalled()
  })

  it('uses the first local address', async () => {
    expect(await resolveHostIp('', async () => ['192.168.1.20', '172.17.0.1'])).toBe('192.168.1.20')
  })

  it('falls back to loopback', async () => {
    expect(await resolveHostIp('', async () => [])).toBe('127.0.0.1')
    expect(await resolveHostIp('', async () => Promise.reject(new Error('no permission')))).toBe('127.0.0.1')
  })
})
