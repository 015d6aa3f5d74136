import si from 'systeminformation'
import { errorMessage } from '../errors'

const LOOPBACK = '127.0.0.1'

export interface InterfaceEntry {
  ip4: string
  internal: boolean
  default: boolean
}

/**
 * Non-internal IPv4 addresses, the default interface first
 */
export function pickLocalIps(interfaces: InterfaceEntry[]): string[] {
  const external = interfaces.filter((iface) => !iface.internal && iface.ip4)
  external.sort((a, b) => Number(b.default) - Number(a.default))
  return [...new Set(external.map((iface) => iface.ip4))]
}

export async function listLocalIps(): Promise<string[]> {
  const result = await si.networkInterfaces()
  return pickLocalIps(Array.isArray(result) ? result : [result])
}

/**
 * Address other machines on the network reach this host at. The configured
 * address wins; loopback is the last resort.
 */
export async function resolveHostIp(
  configured = '',
  lookup: () => Promise<string[]> = listLocalIps
): Promise<string> {
  if (configured) return configured
  try {
    const [first] = await lookup()
    return first ?? LOOPBACK
  } catch (error) {
    console.warn('[host] Cannot read network interfaces:', errorMessage(error))
    return LOOPBACK
  }
}
