import type { DiskInfo, DiskKind, DiskLevel, DiskSettings, DiskView } from '../../src/types'

const VIRTUAL_DEVICES = ['udev', 'tmpfs', 'efivarfs', 'devtmpfs', 'overlay', 'squashfs']
const VIRTUAL_FSTYPES = ['tmpfs', 'devtmpfs', 'squashfs', 'overlay']
const LOCAL_FSTYPES = ['ext4', 'ext3', 'ext2', 'xfs', 'btrfs', 'ntfs', 'vfat', 'exfat', 'apfs', 'hfs', 'zfs']
const SMB_HINTS = ['smb', 'samba', 'cifs', 'windows', 'nas', 'share']
const NFS_HINTS = ['nfs', 'network']
const SYSTEM_MOUNTS = ['/', '/boot']

const GB = 1024 ** 3

interface Classification {
  kind: DiskKind
  icon: string
  network: boolean
}

const kinds: Record<DiskKind, Classification> = {
  System: { kind: 'System', icon: '💾', network: false },
  Boot: { kind: 'Boot', icon: '🔧', network: false },
  Local: { kind: 'Local', icon: '💽', network: false },
  SMB: { kind: 'SMB', icon: '🌐', network: true },
  NFS: { kind: 'NFS', icon: '🖥️', network: true },
  SSHFS: { kind: 'SSHFS', icon: '🔐', network: true },
  'SMB (FUSE)': { kind: 'SMB (FUSE)', icon: '🌐', network: true },
  'NFS (FUSE)': { kind: 'NFS (FUSE)', icon: '🖥️', network: true },
  FUSE: { kind: 'FUSE', icon: '🔗', network: false },
  Other: { kind: 'Other', icon: '📁', network: false },
}

const hasHint = (text: string, hints: string[]) => hints.some((hint) => text.includes(hint))

export function isVirtualFilesystem(device: string, fstype: string): boolean {
  return hasHint(device, VIRTUAL_DEVICES) || VIRTUAL_FSTYPES.includes(fstype.toLowerCase())
}

export function isEfiMount(mountpoint: string): boolean {
  return mountpoint.startsWith('/boot/efi')
}

/**
 * Tell local disks from network shares by filesystem type, device and mount point
 */
export function classifyFilesystem(fstype: string, device: string, mountpoint: string): Classification {
  const type = fstype.toLowerCase()
  const mount = mountpoint.toLowerCase()

  if (['cifs', 'smb', 'samba'].includes(type) || device.includes('//')) return kinds.SMB
  if (['nfs', 'nfs4'].includes(type)) return kinds.NFS
  // server:/export
  if (device.includes(':') && device.includes('/')) return kinds.NFS
  if (type.includes('fuse.sshfs')) return kinds.SSHFS
  if (type.includes('fuse')) {
    if (hasHint(mount, SMB_HINTS)) return kinds['SMB (FUSE)']
    if (hasHint(mount, NFS_HINTS)) return kinds['NFS (FUSE)']
    return kinds.FUSE
  }
  if (LOCAL_FSTYPES.includes(type)) {
    if (mountpoint === '/') return kinds.System
    if (mountpoint === '/boot') return kinds.Boot
    return kinds.Local
  }
  if (hasHint(mount, SMB_HINTS)) return kinds.SMB
  if (hasHint(mount, NFS_HINTS)) return kinds.NFS
  return kinds.Other
}

/**
 * Shorten a mount path to `/first/.../last` when it would not fit a tile.
 * Larger fonts leave room for fewer characters.
 */
export function shortenMountPath(fullPath: string, fontSize: number): string {
  const threshold = Math.max(10, 34 - fontSize)
  if (fullPath.length <= threshold) return fullPath

  const parts = fullPath.split('/').filter(Boolean)
  if (parts.length <= 2) return fullPath

  const shortened = `/${parts[0]}/.../${parts[parts.length - 1]}`
  return shortened.length < fullPath.length ? shortened : fullPath
}

export function diskLevel(percent: number): DiskLevel {
  if (percent > 90) return 'danger'
  if (percent > 80) return 'warning'
  return 'normal'
}

/**
 * Apply the user's disk filters and add the display fields the disk panel uses
 */
export function prepareDiskView(disks: DiskInfo[], settings: DiskSettings, fontSize: number): DiskView[] {
  return disks
    .filter((disk) => !isEfiMount(disk.mountpoint))
    .filter((disk) => settings.showSystem || !SYSTEM_MOUNTS.includes(disk.mountpoint))
    .filter((disk) => settings.showMounted || !disk.network)
    .map((disk) => ({
      ...disk,
      shortPath: shortenMountPath(disk.mountpoint, fontSize),
      usedGb: disk.used / GB,
      totalGb: disk.total / GB,
      level: diskLevel(disk.percent),
    }))
}
