import { z } from 'zod'
import { SORT_METHODS } from '../../src/types'
import type {
  ContainerOverride,
  DiskSettings,
  Favorite,
  SettingsDocument,
  SortSettings,
  UiSettings,
} from '../../src/types'
import { DEFAULT_ICON, defaultOverride } from './normalizer'

export const SETTINGS_VERSION = '3.0'
export const DEFAULT_FAVORITE_ICON = '🌐'

export const DEFAULT_SORT_SETTINGS: SortSettings = {
  method: 'name_asc',
  groupByStatus: true,
}

export const DEFAULT_UI_SETTINGS: UiSettings = {
  background: '#1a1a1a',
  cardBackground: '#2d2d2d',
  textColor: '#e0e0e0',
  accentColor: '#4CAF50',
  borderColor: '#404040',
  borderRadius: 8,
  fontSizeBase: 14,
  fontSizeLarge: 16,
  fontSizeSmall: 12,
}

export const DEFAULT_DISK_SETTINGS: DiskSettings = {
  showSystem: true,
  showMounted: true,
}

// Every field falls back on its own, so a partial or damaged section keeps
// whatever it still has right.
const overrideSchema = z.object({
  visible: z.boolean().catch(true),
  customName: z.string().catch(''),
  customUrl: z.string().catch(''),
  icon: z.string().catch(DEFAULT_ICON),
})

const sortSettingsSchema = z.object({
  method: z.enum(SORT_METHODS).catch(DEFAULT_SORT_SETTINGS.method),
  groupByStatus: z.boolean().catch(DEFAULT_SORT_SETTINGS.groupByStatus),
})

const size = (fallback: number) => z.coerce.number().int().positive().catch(fallback)

const uiSettingsSchema = z.object({
  background: z.string().catch(DEFAULT_UI_SETTINGS.background),
  cardBackground: z.string().catch(DEFAULT_UI_SETTINGS.cardBackground),
  textColor: z.string().catch(DEFAULT_UI_SETTINGS.textColor),
  accentColor: z.string().catch(DEFAULT_UI_SETTINGS.accentColor),
  borderColor: z.string().catch(DEFAULT_UI_SETTINGS.borderColor),
  borderRadius: z.coerce.number().int().nonnegative().catch(DEFAULT_UI_SETTINGS.borderRadius),
  fontSizeBase: size(DEFAULT_UI_SETTINGS.fontSizeBase),
  fontSizeLarge: size(DEFAULT_UI_SETTINGS.fontSizeLarge),
  fontSizeSmall: size(DEFAULT_UI_SETTINGS.fontSizeSmall),
})

const diskSettingsSchema = z.object({
  showSystem: z.boolean().catch(DEFAULT_DISK_SETTINGS.showSystem),
  showMounted: z.boolean().catch(DEFAULT_DISK_SETTINGS.showMounted),
})

const favoriteSchema = z.object({
  name: z.string().catch(''),
  url: z.string().catch(''),
  icon: z.string().min(1).catch(DEFAULT_FAVORITE_ICON),
})

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function section(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {}
}

export function withOverrideDefaults(value: unknown): ContainerOverride {
  return overrideSchema.parse(section(value))
}

export function withSortDefaults(value: unknown): SortSettings {
  return sortSettingsSchema.parse(section(value))
}

export function withUiDefaults(value: unknown): UiSettings {
  return uiSettingsSchema.parse(section(value))
}

export function withDiskDefaults(value: unknown): DiskSettings {
  return diskSettingsSchema.parse(section(value))
}

export function withFavoriteDefaults(value: unknown): Favorite[] {
  if (!Array.isArray(value)) return []
  return value.filter(isRecord).map((entry) => favoriteSchema.parse(entry))
}

/**
 * Fill every category of a loaded document with its defaults.
 */
export function withDocumentDefaults(value: unknown): SettingsDocument {
  const doc = section(value)
  const containers: Record<string, ContainerOverride> = {}
  for (const [id, override] of Object.entries(section(doc.containers))) {
    containers[id] = withOverrideDefaults(override)
  }

  return {
    settingsVersion: SETTINGS_VERSION,
    containers,
    sortSettings: withSortDefaults(doc.sortSettings),
    uiSettings: withUiDefaults(doc.uiSettings),
    diskSettings: withDiskDefaults(doc.diskSettings),
    favorites: withFavoriteDefaults(doc.favorites),
  }
}

export function defaultDocument(): SettingsDocument {
  return withDocumentDefaults({})
}

function renameKeys(value: unknown, names: Record<string, string>): Record<string, unknown> {
  const renamed: Record<string, unknown> = {}
  for (const [key, entry] of Object.entries(section(value))) {
    renamed[names[key] ?? key] = entry
  }
  return renamed
}

/**
 * Documents written before 3.0 used snake_case keys throughout.
 */
export function isLegacyDocument(value: unknown): boolean {
  return isRecord(value) && !('settingsVersion' in value)
}

export function fromLegacyDocument(value: unknown): SettingsDocument {
  const doc = section(value)
  const containers: Record<string, unknown> = {}
  for (const [id, override] of Object.entries(section(doc.containers))) {
    containers[id] = renameKeys(override, { custom_name: 'customName', custom_url: 'customUrl' })
  }

  return withDocumentDefaults({
    containers,
    sortSettings: renameKeys(doc.sort_settings, { group_by_status: 'groupByStatus' }),
    uiSettings: renameKeys(doc.ui_settings, {
      card_background: 'cardBackground',
      text_color: 'textColor',
      accent_color: 'accentColor',
      border_color: 'borderColor',
      border_radius: 'borderRadius',
      font_size_base: 'fontSizeBase',
      font_size_large: 'fontSizeLarge',
      font_size_small: 'fontSizeSmall',
    }),
    diskSettings: renameKeys(doc.disk_settings, {
      show_system: 'showSystem',
      show_mounted: 'showMounted',
    }),
    favorites: doc.favorites,
  })
}

/**
 * Trim a user-entered URL and give it a scheme when it has none.
 */
export function normalizeUrl(url: string): string {
  const trimmed = url.trim()
  if (trimmed === '') return ''
  if (trimmed.startsWith('http://') || trimmed.startsWith('https://')) return trimmed
  return `http://${trimmed}`
}

/**
 * Apply a patch to a stored override, or to the defaults when none is stored
 */
export function mergeOverride(
  current: ContainerOverride | undefined,
  patch: Partial<ContainerOverride>
): ContainerOverride {
  const next: ContainerOverride = { ...(current ?? defaultOverride()), ...patch }
  if (patch.customUrl !== undefined) {
    next.customUrl = normalizeUrl(patch.customUrl)
  }
  return next
}

export function cleanFavorites(favorites: Favorite[]): Favorite[] {
  return favorites
    .filter((fav) => fav.url.trim() !== '')
    .map((fav) => ({
      name: fav.name.trim(),
      url: normalizeUrl(fav.url),
      icon: fav.icon || DEFAULT_FAVORITE_ICON,
    }))
}
