import { Router } from 'express'
import { z } from 'zod'
import { SORT_METHODS } from '../../src/types'
import type { AppDeps } from '../app'
import { errorMessage } from '../errors'
import { getStringParam, parseBody, validateSettingsKey } from '../middleware'

const hexColor = z.string().regex(/^#[0-9a-fA-F]{3,8}$/, 'must be a hex color')

const overridePatchSchema = z
  .object({
    visible: z.boolean(),
    customName: z.string().max(100),
    customUrl: z.string().max(2048),
    icon: z.string().max(16),
  })
  .partial()
  .strict()

const sortPatchSchema = z
  .object({
    method: z.enum(SORT_METHODS),
    groupByStatus: z.boolean(),
  })
  .partial()
  .strict()

const uiPatchSchema = z
  .object({
    background: hexColor,
    cardBackground: hexColor,
    textColor: hexColor,
    accentColor: hexColor,
    borderColor: hexColor,
    borderRadius: z.number().int().min(0).max(32),
    fontSizeBase: z.number().int().min(8).max(32),
    fontSizeLarge: z.number().int().min(8).max(40),
    fontSizeSmall: z.number().int().min(6).max(24),
  })
  .partial()
  .strict()

const diskPatchSchema = z
  .object({
    showSystem: z.boolean(),
    showMounted: z.boolean(),
  })
  .partial()
  .strict()

const favoritesSchema = z.object({
  favorites: z
    .array(
      z.object({
        name: z.string().max(100).default(''),
        url: z.string().max(2048),
        icon: z.string().max(16).default(''),
      })
    )
    .max(100),
})

export function settingsRouter({ store }: Pick<AppDeps, 'store'>) {
  const router = Router()

  // GET /api/settings/containers - Every stored override, including removed containers
  router.get('/containers', async (_req, res) => {
    try {
      res.json(await store.listOverrides())
    } catch (error) {
      console.error('[api] Error reading container settings:', errorMessage(error))
      res.status(500).json({ error: 'Failed to read container settings' })
    }
  })

  // PATCH /api/settings/containers/:id - Update some fields of an override
  router.patch('/containers/:id', validateSettingsKey, async (req, res) => {
    const patch = parseBody(overridePatchSchema, req, res)
    if (!patch) return

    const id = getStringParam(req.params.id) ?? ''
    try {
      res.json(await store.setOverride(id, patch))
    } catch (error) {
      console.error(`[api] Error saving settings for ${id}:`, errorMessage(error))
      res.status(500).json({ error: 'Failed to save container settings', message: errorMessage(error) })
    }
  })

  // DELETE /api/settings/containers/:id - Forget an override
  router.delete('/containers/:id', validateSettingsKey, async (req, res) => {
    const id = getStringParam(req.params.id) ?? ''
    try {
      const deleted = await store.deleteOverride(id)
      if (!deleted) {
        res.status(404).json({ error: 'No settings stored for this container' })
        return
      }
      res.json({ success: true })
    } catch (error) {
      console.error(`[api] Error deleting settings for ${id}:`, errorMessage(error))
      res.status(500).json({ error: 'Failed to delete container settings', message: errorMessage(error) })
    }
  })

  router.get('/sort', async (_req, res) => {
    try {
      res.json(await store.getSortSettings())
    } catch (error) {
      console.error('[api] Error reading sort settings:', errorMessage(error))
      res.status(500).json({ error: 'Failed to read sort settings' })
    }
  })

  router.put('/sort', async (req, res) => {
    const patch = parseBody(sortPatchSchema, req, res)
    if (!patch) return
    try {
      res.json(await store.setSortSettings(patch))
    } catch (error) {
      console.error('[api] Error saving sort settings:', errorMessage(error))
      res.status(500).json({ error: 'Failed to save sort settings', message: errorMessage(error) })
    }
  })

  router.get('/ui', async (_req, res) => {
    try {
      res.json(await store.getUiSettings())
    } catch (error) {
      console.error('[api] Error reading UI settings:', errorMessage(error))
      res.status(500).json({ error: 'Failed to read UI settings' })
    }
  })

  router.put('/ui', async (req, res) => {
    const patch = parseBody(uiPatchSchema, req, res)
    if (!patch) return
    try {
      res.json(await store.setUiSettings(patch))
    } catch (error) {
      console.error('[api] Error saving UI settings:', errorMessage(error))
      res.status(500).json({ error: 'Failed to save UI settings', message: errorMessage(error) })
    }
  })

  router.get('/disks', async (_req, res) => {
    try {
      res.json(await store.getDiskSettings())
    } catch (error) {
      console.error('[api] Error reading disk settings:', errorMessage(error))
      res.status(500).json({ error: 'Failed to read disk settings' })
    }
  })

  router.put('/disks', async (req, res) => {
    const patch = parseBody(diskPatchSchema, req, res)
    if (!patch) return
    try {
      res.json(await store.setDiskSettings(patch))
    } catch (error) {
      console.error('[api] Error saving disk settings:', errorMessage(error))
      res.status(500).json({ error: 'Failed to save disk settings', message: errorMessage(error) })
    }
  })

  router.get('/favorites', async (_req, res) => {
    try {
      res.json(await store.getFavorites())
    } catch (error) {
      console.error('[api] Error reading favorites:', errorMessage(error))
      res.status(500).json({ error: 'Failed to read favorites' })
    }
  })

  router.put('/favorites', async (req, res) => {
    const body = parseBody(favoritesSchema, req, res)
    if (!body) return
    try {
      res.json(await store.setFavorites(body.favorites))
    } catch (error) {
      console.error('[api] Error saving favorites:', errorMessage(error))
      res.status(500).json({ error: 'Failed to save favorites', message: errorMessage(error) })
    }
  })

  return router
}
