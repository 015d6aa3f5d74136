import type { Server, Socket } from 'socket.io'
import { RateLimiterMemory, RateLimiterRes } from 'rate-limiter-flexible'
import { config } from '../config'
import { errorMessage } from '../errors'
import type { AppDeps } from '../app'
import type {
  ClientToServerEvents,
  HostOverview,
  ServerToClientEvents,
  ServicesUpdate,
} from '../../src/types'

type IOServer = Server<ClientToServerEvents, ServerToClientEvents>
type IOSocket = Socket<ClientToServerEvents, ServerToClientEvents>

export type SocketDeps = Pick<AppDeps, 'discovery' | 'containers' | 'system'>

export interface PollingIntervals {
  services: number
  system: number
}

// Manual refreshes hit Docker; a few every ten seconds per socket is plenty
const refreshLimiter = new RateLimiterMemory({
  points: 5,
  duration: 10,
})

export function setupSocketHandlers(
  io: IOServer,
  deps: SocketDeps,
  intervals: PollingIntervals = config.polling
) {
  let servicesInterval: NodeJS.Timeout | null = null
  let systemInterval: NodeJS.Timeout | null = null

  async function readOverview(): Promise<HostOverview> {
    const [system, containers] = await Promise.all([
      deps.system.getStats(),
      deps.containers.getCounts(),
    ])
    return { system, containers }
  }

  async function pushServices(send: (update: ServicesUpdate) => void) {
    try {
      const { services, sourceAvailable } = await deps.discovery.discover('dashboard')
      send({ services, sourceAvailable })
    } catch (error) {
      console.error('[socket] Error polling services:', errorMessage(error))
    }
  }

  async function pushOverview(send: (overview: HostOverview) => void) {
    try {
      send(await readOverview())
    } catch (error) {
      console.error('[socket] Error polling system:', errorMessage(error))
    }
  }

  function startPolling() {
    stopPolling()

    servicesInterval = setInterval(() => {
      if (io.engine.clientsCount > 0) {
        void pushServices((update) => io.emit('services:update', update))
      }
    }, intervals.services)

    systemInterval = setInterval(() => {
      if (io.engine.clientsCount > 0) {
        void pushOverview((overview) => io.emit('system:stats', overview))
      }
    }, intervals.system)
  }

  function stopPolling() {
    if (servicesInterval) {
      clearInterval(servicesInterval)
      servicesInterval = null
    }
    if (systemInterval) {
      clearInterval(systemInterval)
      systemInterval = null
    }
  }

  // Enabled when DASHBOARD_API_KEY is set
  io.use((socket, next) => {
    const apiKey = process.env.DASHBOARD_API_KEY
    if (!apiKey) {
      next()
      return
    }

    const auth: Record<string, unknown> = socket.handshake.auth
    const token = auth.token ?? socket.handshake.headers['x-api-key']
    if (token !== apiKey) {
      console.warn(`[socket] Auth failed for ${socket.id}: invalid or missing API key`)
      next(new Error('Authentication required'))
      return
    }
    next()
  })

  io.on('connection', (socket: IOSocket) => {
    console.log(`[socket] Client connected: ${socket.id}`)

    const sendServices = (update: ServicesUpdate) => socket.emit('services:update', update)
    void pushServices(sendServices)
    void pushOverview((overview) => socket.emit('system:stats', overview))

    socket.on('services:refresh', async () => {
      try {
        await refreshLimiter.consume(socket.id)
      } catch (error) {
        if (error instanceof RateLimiterRes) {
          console.warn(`[socket] Refresh rate limited for ${socket.id}`)
        } else {
          console.error('[socket] Rate limiter failed:', errorMessage(error))
        }
        return
      }
      await pushServices(sendServices)
    })

    socket.on('disconnect', () => {
      console.log(`[socket] Client disconnected: ${socket.id}`)
    })
  })

  startPolling()

  return { stopPolling }
}
