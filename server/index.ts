import { createServer } from 'http'
import path from 'path'
import { fileURLToPath } from 'url'
import { Server } from 'socket.io'
import { createApp } from './app'
import { config } from './config'
import {
  containerManager,
  serviceDiscovery,
  settingsStore,
  systemMonitor,
} from './services'
import { setupSocketHandlers } from './socket/handlers'
import type { ClientToServerEvents, ServerToClientEvents } from '../src/types'

const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)

const deps = {
  discovery: serviceDiscovery,
  store: settingsStore,
  containers: containerManager,
  system: systemMonitor,
}

// In development Vite serves the front end on its own port
const staticDir = process.env.VITE_DEV_SERVER ? undefined : path.join(__dirname, '..', 'dist')

const app = createApp(deps, { staticDir })
const httpServer = createServer(app)

const io = new Server<ClientToServerEvents, ServerToClientEvents>(httpServer, {
  cors: {
    origin: config.getCorsOrigins(),
    methods: ['GET', 'POST'],
  },
})

const sockets = setupSocketHandlers(io, deps)

const server = httpServer.listen(config.port, () => {
  console.log(`Dashboard running on http://localhost:${config.port}`)
  console.log(`   API: http://localhost:${config.port}/api`)
  console.log(`   Settings: ${config.settingsFile}`)
  console.log(`   Docker socket: ${config.docker.socketPath}`)
  console.log(`   CORS origins: ${config.getCorsOrigins().join(', ')}`)
  console.log(`   Rate limit: ${config.rateLimit} req/min`)
  console.log(`   API key auth: ${process.env.DASHBOARD_API_KEY ? 'enabled' : 'disabled'}`)

  void containerManager.ping().then((ok) => {
    if (!ok) {
      console.warn('[docker] Docker is not reachable; the dashboard will show no services until it is')
    }
  })
})

function shutdown(signal: string) {
  console.log(`\nReceived ${signal}. Shutting down gracefully...`)
  sockets.stopPolling()

  io.close(() => {
    console.log('Socket.io connections closed')
  })

  server.close((err) => {
    if (err) {
      console.error('Error closing HTTP server:', err)
      process.exit(1)
    }
    console.log('HTTP server closed')
    process.exit(0)
  })

  setTimeout(() => {
    console.error('Forced shutdown after timeout')
    process.exit(1)
  }, 10000).unref()
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))

export { io }
