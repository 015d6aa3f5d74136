import si from 'systeminformation'
import type { DiskInfo, SystemStats } from '../../src/types'
import { errorMessage } from '../errors'
import { listLocalIps } from './hostAddress'
import { classifyFilesystem, isEfiMount, isVirtualFilesystem } from './diskView'

export class SystemMonitor {
  /**
   * Get system statistics
   */
  async getStats(): Promise<SystemStats> {
    const [cpu, mem, time, os, temperature, localIps, disks] = await Promise.all([
      si.currentLoad(),
      si.mem(),
      si.time(),
      si.osInfo(),
      this.getCpuTemperature(),
      this.getLocalIps(),
      this.getDisks(),
    ])

    return {
      hostname: os.hostname,
      localIps,
      cpu: {
        usage: cpu.currentLoad,
        cores: cpu.cpus.length,
        temperature,
      },
      memory: {
        used: mem.active,
        total: mem.total,
        percent: mem.total > 0 ? (mem.active / mem.total) * 100 : 0,
      },
      uptime: time.uptime,
      disks,
    }
  }

  /**
   * Physical and network filesystems, sorted by mount point
   */
  async getDisks(): Promise<DiskInfo[]> {
    try {
      const filesystems = await si.fsSize()
      return filesystems
        .filter((fs) => !isVirtualFilesystem(fs.fs, fs.type) && !isEfiMount(fs.mount))
        .map((fs) => ({
          device: fs.fs,
          fstype: fs.type,
          ...classifyFilesystem(fs.type, fs.fs, fs.mount),
          mountpoint: fs.mount,
          total: fs.size,
          used: fs.used,
          percent: fs.use ?? 0,
        }))
        .sort((a, b) => a.mountpoint.localeCompare(b.mountpoint))
    } catch (error) {
      console.error('[system] Cannot read filesystems:', errorMessage(error))
      return []
    }
  }

  /**
   * Main CPU temperature in °C, or null on hosts without a readable sensor
   */
  async getCpuTemperature(): Promise<number | null> {
    try {
      const { main } = await si.cpuTemperature()
      return typeof main === 'number' && main > 0 ? Math.round(main * 10) / 10 : null
    } catch {
      return null
    }
  }

  private async getLocalIps(): Promise<string[]> {
    try {
      return await listLocalIps()
    } catch (error) {
      console.warn('[system] Cannot read network interfaces:', errorMessage(error))
      return []
    }
  }
}

export const systemMonitor = new SystemMonitor()
