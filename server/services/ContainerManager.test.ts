import type Docker from 'dockerode'
import { describe, expect, it } from 'vitest'
import { computeUsage, parseStatus, toRawContainer, type StatsSample } from './ContainerManager'

function containerInfo(fields: Partial<Docker.ContainerInfo> = {}): Docker.ContainerInfo {
  return {
    Id: 'f00dfeedbeef0123456789ab',
    Names: ['/photos'],
    Image: 'immich:release',
    ImageID: 'sha256:1234',
    Command: 'start.sh',
    Created: 1700000000,
    Ports: [],
    Labels: {},
    State: 'running',
    Status: 'Up 2 hours',
    HostConfig: { NetworkMode: 'bridge' },
    NetworkSettings: { Networks: {} },
    Mounts: [],
    ...fields,
  }
}

describe('toRawContainer', () => {
  it('groups published ports by container port', () => {
    const raw = toRawContainer(
      containerInfo({
        Ports: [
          { IP: '0.0.0.0', PrivatePort: 80, PublicPort: 8080, Type: 'tcp' },
          { IP: '::', PrivatePort: 80, PublicPort: 8080, Type: 'tcp' },
          { IP: '', PrivatePort: 5432, PublicPort: 0, Type: 'tcp' },
        ],
      })
    )

    expect(raw.portBindings).toEqual({
      '80/tcp': [
        { HostIp: '0.0.0.0', HostPort: '8080' },
        { HostIp: '::', HostPort: '8080' },
      ],
      '5432/tcp': [],
    })
  })

  it('strips the leading slash from the name', () => {
    expect(toRawContainer(containerInfo()).name).toBe('photos')
  })

  it('falls back to the short id without a name', () => {
    expect(toRawContainer(containerInfo({ Names: [] })).name).toBe('f00dfeedbeef')
  })

  it('reports untagged images as unknown', () => {
    expect(toRawContainer(containerInfo({ Image: 'sha256:abcdef' })).imageTag).toBe('unknown')
    expect(toRawContainer(containerInfo()).imageTag).toBe('immich:release')
  })
})

describe('parseStatus', () => {
  it('maps docker states', () => {
    expect(parseStatus('Running')).toBe('running')
    expect(parseStatus('paused')).toBe('paused')
    expect(parseStatus('something-new')).toBe('exited')
  })
})

describe('computeUsage', () => {
  const sample: StatsSample = {
    cpu_stats: { cpu_usage: { total_usage: 300 }, system_cpu_usage: 2000, online_cpus: 4 },
    precpu_stats: { cpu_usage: { total_usage: 100 }, system_cpu_usage: 1000, online_cpus: 4 },
    memory_stats: { usage: 256 * 1024 * 1024, limit: 1024 * 1024 * 1024 },
    networks: {
      eth0: { rx_bytes: 1000, tx_bytes: 500 },
      eth1: { rx_bytes: 24, tx_bytes: 12 },
    },
    blkio_stats: {
      io_service_bytes_recursive: [
        { op: 'Read', value: 4096 },
        { op: 'Write', value: 1024 },
        { op: 'read', value: 4096 },
        { op: 'Total', value: 9216 },
      ],
    },
    pids_stats: { current: 7 },
  }

  it('derives percentages and totals', () => {
    expect(computeUsage(sample)).toEqual({
      cpu: 80,
      memoryUsedMb: 256,
      memoryPercent: 25,
      ioRead: 8192,
      ioWrite: 1024,
      networkRx: 1024,
      networkTx: 512,
      pids: 7,
    })
  })

  it('reports zero when the system counter did not move', () => {
    const idle: StatsSample = {
      ...sample,
      precpu_stats: { ...sample.cpu_stats },
    }
    expect(computeUsage(idle).cpu).toBe(0)
  })

  it('handles samples without optional sections', () => {
    expect(
      computeUsage({
        cpu_stats: { cpu_usage: { total_usage: 0 } },
        precpu_stats: { cpu_usage: { total_usage: 0 } },
        memory_stats: {},
      })
    ).toEqual({
      cpu: 0,
      memoryUsedMb: 0,
      memoryPercent: 0,
      ioRead: 0,
      ioWrite: 0,
      networkRx: 0,
      networkTx: 0,
      pids: 0,
    })
  })
})
