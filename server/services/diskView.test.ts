import { describe, expect, it } from 'vitest'
import { diskInfo } from '../testing/fakes'
import {
  classifyFilesystem,
  diskLevel,
  isEfiMount,
  isVirtualFilesystem,
  prepareDiskView,
  shortenMountPath,
} from './diskView'

describe('classifyFilesystem', () => {
  it.each([
    { fstype: 'ext4', device: '/dev/sda1', mountpoint: '/', kind: 'System', network: false },
    { fstype: 'ext4', device: '/dev/sda2', mountpoint: '/boot', kind: 'Boot', network: false },
    { fstype: 'xfs', device: '/dev/sdb1', mountpoint: '/srv/data', kind: 'Local', network: false },
    { fstype: 'cifs', device: '//nas/media', mountpoint: '/mnt/media', kind: 'SMB', network: true },
    { fstype: 'nfs4', device: 'nas:/export', mountpoint: '/mnt/export', kind: 'NFS', network: true },
    { fstype: 'fuse.sshfs', device: 'sshfs-remote', mountpoint: '/mnt/remote', kind: 'SSHFS', network: true },
    { fstype: 'fuse', device: 'rclone', mountpoint: '/mnt/nas-share', kind: 'SMB (FUSE)', network: true },
    { fstype: 'fuse', device: 'rclone', mountpoint: '/mnt/network-drive', kind: 'NFS (FUSE)', network: true },
    { fstype: 'fuse', device: 'rclone', mountpoint: '/mnt/cloud', kind: 'FUSE', network: false },
    { fstype: 'zfs', device: 'tank/data', mountpoint: '/tank', kind: 'Local', network: false },
    { fstype: '9p', device: 'drvfs', mountpoint: '/mnt/c', kind: 'Other', network: false },
  ])('$fstype at $mountpoint is $kind', ({ fstype, device, mountpoint, kind, network }) => {
    const result = classifyFilesystem(fstype, device, mountpoint)
    expect(result.kind).toBe(kind)
    expect(result.network).toBe(network)
  })

  it('reads a host:path device as NFS before looking at the type', () => {
    expect(classifyFilesystem('fuse.sshfs', 'me@host:/home', '/mnt/remote').kind).toBe('NFS')
  })
})

describe('isVirtualFilesystem', () => {
  it('matches pseudo filesystems by device or type', () => {
    expect(isVirtualFilesystem('tmpfs', 'tmpfs')).toBe(true)
    expect(isVirtualFilesystem('overlay', 'overlay')).toBe(true)
    expect(isVirtualFilesystem('/dev/loop0', 'squashfs')).toBe(true)
    expect(isVirtualFilesystem('/dev/sda1', 'ext4')).toBe(false)
  })
})

describe('isEfiMount', () => {
  it('matches the EFI partition', () => {
    expect(isEfiMount('/boot/efi')).toBe(true)
    expect(isEfiMount('/boot')).toBe(false)
  })
})

describe('shortenMountPath', () => {
  it('keeps short paths', () => {
    expect(shortenMountPath('/mnt/media', 14)).toBe('/mnt/media')
  })

  it('collapses the middle of long paths', () => {
    // threshold 34 - 14 = 20
    expect(shortenMountPath('/srv/storage/volumes/photos', 14)).toBe('/srv/.../photos')
  })

  it('keeps long paths with two segments', () => {
    expect(shortenMountPath('/mnt/a-very-long-share-name-here', 14)).toBe('/mnt/a-very-long-share-name-here')
  })

  it('allows at least ten characters', () => {
    expect(shortenMountPath('/a/b/cdefg', 30)).toBe('/a/b/cdefg')
    // the shortened form would be longer
    expect(shortenMountPath('/a/b/cdefgh', 30)).toBe('/a/b/cdefgh')
    expect(shortenMountPath('/aa/bbbbbb/cc', 30)).toBe('/aa/.../cc')
  })
})

describe('diskLevel', () => {
  it('uses 80 and 90 percent thresholds', () => {
    expect(diskLevel(80)).toBe('normal')
    expect(diskLevel(80.5)).toBe('warning')
    expect(diskLevel(90)).toBe('warning')
    expect(diskLevel(91)).toBe('danger')
  })
})

describe('prepareDiskView', () => {
  const disks = [
    diskInfo(),
    diskInfo({ mountpoint: '/boot', kind: 'Boot', percent: 85 }),
    diskInfo({ mountpoint: '/boot/efi', fstype: 'vfat' }),
    diskInfo({ mountpoint: '/mnt/media', kind: 'SMB', network: true, fstype: 'cifs', percent: 95 }),
    diskInfo({ mountpoint: '/srv', kind: 'Local' }),
  ]

  it('adds display fields', () => {
    const [root] = prepareDiskView(disks, { showSystem: true, showMounted: true }, 14)
    expect(root).toMatchObject({ shortPath: '/', usedGb: 50, totalGb: 100, level: 'normal' })
  })

  it('always drops the EFI partition', () => {
    const view = prepareDiskView(disks, { showSystem: true, showMounted: true }, 14)
    expect(view.map((d) => d.mountpoint)).toEqual(['/', '/boot', '/mnt/media', '/srv'])
    expect(view.map((d) => d.level)).toEqual(['normal', 'warning', 'danger', 'normal'])
  })

  it('hides system mounts and network shares on request', () => {
    expect(prepareDiskView(disks, { showSystem: false, showMounted: true }, 14).map((d) => d.mountpoint)).toEqual([
      '/mnt/media',
      '/srv',
    ])
    expect(prepareDiskView(disks, { showSystem: true, showMounted: false }, 14).map((d) => d.mountpoint)).toEqual([
      '/',
      '/boot',
      '/srv',
    ])
  })
})
