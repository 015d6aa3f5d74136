import type { ContainerCounts } from './container'

export type DiskKind =
  | 'System'
  | 'Boot'
  | 'Local'
  | 'SMB'
  | 'NFS'
  | 'SSHFS'
  | 'SMB (FUSE)'
  | 'NFS (FUSE)'
  | 'FUSE'
  | 'Other'

export interface DiskInfo {
  device: string
  fstype: string
  kind: DiskKind
  icon: string
  network: boolean  // SMB, NFS or SSHFS share
  mountpoint: string
  total: number    // bytes
  used: number     // bytes
  percent: number  // 0-100
}

export type DiskLevel = 'normal' | 'warning' | 'danger'

export interface DiskView extends DiskInfo {
  shortPath: string
  usedGb: number
  totalGb: number
  level: DiskLevel
}

export interface SystemStats {
  hostname: string
  localIps: string[]
  cpu: {
    usage: number
    cores: number
    temperature: number | null  // °C, null without a sensor
  }
  memory: {
    used: number
    total: number
    percent: number
  }
  uptime: number  // seconds
  disks: DiskInfo[]
}

export interface HostOverview {
  system: SystemStats
  containers: ContainerCounts
}
