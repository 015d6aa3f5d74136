import { Router, type Request, type Response } from 'express'
import type { ActionResult, ContainerOverride } from '../../src/types'
import type { AppDeps } from '../app'
import { errorMessage, SettingsReadError } from '../errors'
import { getStringParam, validateContainerId } from '../middleware'

type ContainerAction = 'start' | 'stop' | 'restart'

export function containersRouter({ containers, store }: Pick<AppDeps, 'containers' | 'store'>) {
  const router = Router()

  async function readOverrides(): Promise<Record<string, ContainerOverride>> {
    try {
      return await store.listOverrides()
    } catch (error) {
      if (!(error instanceof SettingsReadError)) throw error
      console.warn('[api] Cannot read overrides for container icons:', error.message)
      return {}
    }
  }

  // GET /api/containers/stats - Resource usage of every container
  router.get('/stats', async (_req, res) => {
    try {
      const [usage, overrides] = await Promise.all([containers.getUsage(), readOverrides()])
      res.json(
        usage.map((entry) => {
          const icon = overrides[entry.id]?.icon
          return icon ? { ...entry, icon } : entry
        })
      )
    } catch (error) {
      console.error('[api] Error getting container stats:', errorMessage(error))
      res.status(500).json({ error: 'Failed to get container stats' })
    }
  })

  const actions: Record<ContainerAction, (id: string) => Promise<ActionResult>> = {
    start: (id) => containers.startContainer(id),
    stop: (id) => containers.stopContainer(id),
    restart: (id) => containers.restartContainer(id),
  }

  function actionHandler(action: ContainerAction) {
    return async (req: Request, res: Response) => {
      const id = getStringParam(req.params.id) ?? ''
      try {
        const result = await actions[action](id)
        if (!result.success) {
          res.status(500).json({ error: `Failed to ${action} container`, message: result.error })
          return
        }
        res.json({ success: true })
      } catch (error) {
        console.error(`[api] Error running ${action} on container:`, errorMessage(error))
        res.status(500).json({ error: `Failed to ${action} container` })
      }
    }
  }

  // POST /api/containers/:id/start|stop|restart
  router.post('/:id/start', validateContainerId, actionHandler('start'))
  router.post('/:id/stop', validateContainerId, actionHandler('stop'))
  router.post('/:id/restart', validateContainerId, actionHandler('restart'))

  return router
}
