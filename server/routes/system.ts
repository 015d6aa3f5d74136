import { Router } from 'express'
import type { AppDeps } from '../app'
import { errorMessage } from '../errors'
import { prepareDiskView } from '../services/diskView'

export function systemRouter({ system, containers, store }: Pick<AppDeps, 'system' | 'containers' | 'store'>) {
  const router = Router()

  // GET /api/system/stats - Host figures plus container counts
  router.get('/stats', async (_req, res) => {
    try {
      const [stats, counts] = await Promise.all([system.getStats(), containers.getCounts()])
      res.json({ system: stats, containers: counts })
    } catch (error) {
      console.error('[api] Error getting stats:', errorMessage(error))
      res.status(500).json({ error: 'Failed to get system stats' })
    }
  })

  // GET /api/system/disks - Disks filtered by the user's disk settings
  router.get('/disks', async (_req, res) => {
    try {
      const [disks, diskSettings, uiSettings] = await Promise.all([
        system.getDisks(),
        store.getDiskSettings(),
        store.getUiSettings(),
      ])
      res.json(prepareDiskView(disks, diskSettings, uiSettings.fontSizeBase))
    } catch (error) {
      console.error('[api] Error getting disks:', errorMessage(error))
      res.status(500).json({ error: 'Failed to get disks' })
    }
  })

  return router
}
