import express from 'express'
import cors from 'cors'
import rateLimit from 'express-rate-limit'
import path from 'path'
import { config } from './config'
import { optionalApiKey } from './middleware'
import { containersRouter } from './routes/containers'
import { servicesRouter } from './routes/services'
import { settingsRouter } from './routes/settings'
import { systemRouter } from './routes/system'
import type { ContainerManager } from './services/ContainerManager'
import type { ServiceDiscovery } from './services/ServiceDiscovery'
import type { SettingsStore } from './services/SettingsStore'
import type { SystemMonitor } from './services/SystemMonitor'

export interface AppDeps {
  discovery: Pick<ServiceDiscovery, 'discover'>
  store: SettingsStore
  containers: Pick<
    ContainerManager,
    'getCounts' | 'getUsage' | 'startContainer' | 'stopContainer' | 'restartContainer'
  >
  system: Pick<SystemMonitor, 'getStats' | 'getDisks'>
}

export interface AppOptions {
  corsOrigins?: string[]
  /** API requests per minute per IP */
  rateLimit?: number
  /** Built front end to serve; nothing is served when omitted */
  staticDir?: string
}

export function createApp(deps: AppDeps, options: AppOptions = {}) {
  const app = express()

  app.use(cors({
    origin: options.corsOrigins ?? config.getCorsOrigins(),
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'],
    credentials: true,
  }))
  app.use(express.json())

  const apiLimiter = rateLimit({
    windowMs: 60 * 1000,
    limit: options.rateLimit ?? config.rateLimit,
    message: { error: 'Too many requests', message: 'Please try again later' },
    standardHeaders: true,
    legacyHeaders: false,
  })
  app.use('/api/', apiLimiter)

  // Enabled when DASHBOARD_API_KEY is set
  app.use('/api/', optionalApiKey)

  app.use('/api/services', servicesRouter(deps))
  app.use('/api/settings', settingsRouter(deps))
  app.use('/api/system', systemRouter(deps))
  app.use('/api/containers', containersRouter(deps))

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() })
  })

  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'Not found' })
  })

  const { staticDir } = options
  if (staticDir) {
    app.use(express.static(staticDir))

    // SPA fallback
    app.use((req, res, next) => {
      if (req.method !== 'GET') {
        next()
        return
      }
      res.sendFile(path.join(staticDir, 'index.html'))
    })
  }

  return app
}
