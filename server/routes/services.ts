import { Router, type Response } from 'express'
import type { DiscoveryView } from '../../src/types'
import type { AppDeps } from '../app'
import { errorMessage } from '../errors'
import { getStringParam, validateContainerId } from '../middleware'

export const DEGRADED_HEADER = 'X-Discovery-Degraded'

export function servicesRouter({ discovery, store }: Pick<AppDeps, 'discovery' | 'store'>) {
  const router = Router()

  async function sendServices(view: DiscoveryView, res: Response) {
    try {
      const result = await discovery.discover(view)
      if (!result.sourceAvailable) {
        res.setHeader(DEGRADED_HEADER, 'source-unavailable')
      }
      res.json(result.services)
    } catch (error) {
      console.error(`[api] Error listing services (${view}):`, errorMessage(error))
      res.status(500).json({ error: 'Failed to list services' })
    }
  }

  // GET /api/services - Visible services for the dashboard
  router.get('/', (_req, res) => sendServices('dashboard', res))

  // GET /api/services/all - Every service, hidden ones included
  router.get('/all', (_req, res) => sendServices('admin', res))

  // POST /api/services/:id/hide - Hide a service from the dashboard
  router.post('/:id/hide', validateContainerId, async (req, res) => {
    const id = getStringParam(req.params.id) ?? ''
    try {
      const override = await store.hideService(id)
      res.json(override)
    } catch (error) {
      console.error(`[api] Error hiding service ${id}:`, errorMessage(error))
      res.status(500).json({ error: 'Failed to hide service', message: errorMessage(error) })
    }
  })

  return router
}
