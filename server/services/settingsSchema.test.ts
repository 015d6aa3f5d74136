import { describe, expect, it } from 'vitest'
import {
  DEFAULT_UI_SETTINGS,
  cleanFavorites,
  fromLegacyDocument,
  isLegacyDocument,
  mergeOverride,
  normalizeUrl,
  withDocumentDefaults,
  withFavoriteDefaults,
  withUiDefaults,
} from './settingsSchema'

describe('normalizeUrl', () => {
  it('adds a scheme when missing', () => {
    expect(normalizeUrl('nas.lan:5000')).toBe('http://nas.lan:5000')
  })

  it('keeps http and https urls', () => {
    expect(normalizeUrl('https://nas.lan')).toBe('https://nas.lan')
    expect(normalizeUrl('http://nas.lan')).toBe('http://nas.lan')
  })

  it('trims and keeps empty values empty', () => {
    expect(normalizeUrl('  ')).toBe('')
    expect(normalizeUrl(' https://x.lan ')).toBe('https://x.lan')
  })
})

describe('withUiDefaults', () => {
  it('replaces only the broken fields', () => {
    expect(withUiDefaults({ background: '#000000', fontSizeBase: 'huge', borderRadius: '4' })).toEqual({
      ...DEFAULT_UI_SETTINGS,
      background: '#000000',
      borderRadius: 4,
    })
  })

  it('ignores a section that is not an object', () => {
    expect(withUiDefaults('dark')).toEqual(DEFAULT_UI_SETTINGS)
  })
})

describe('withFavoriteDefaults', () => {
  it('drops entries that are not objects and defaults the icon', () => {
    expect(withFavoriteDefaults([{ name: 'Router', url: 'http://router' }, 'junk', null])).toEqual([
      { name: 'Router', url: 'http://router', icon: '🌐' },
    ])
  })

  it('treats a non-array as empty', () => {
    expect(withFavoriteDefaults({ name: 'x' })).toEqual([])
  })
})

describe('withDocumentDefaults', () => {
  it('ignores a containers section that is not an object', () => {
    expect(withDocumentDefaults({ containers: ['x'] }).containers).toEqual({})
  })
})

describe('legacy documents', () => {
  it('are recognized by the missing version', () => {
    expect(isLegacyDocument({ containers: {} })).toBe(true)
    expect(isLegacyDocument({ settingsVersion: '3.0' })).toBe(false)
    expect(isLegacyDocument([])).toBe(false)
  })

  it('map snake_case keys', () => {
    const doc = fromLegacyDocument({
      ui_settings: { card_background: '#111111', border_radius: 2 },
      favorites: [{ name: 'NAS', url: 'http://nas', icon: '🗄️' }],
    })
    expect(doc.uiSettings.cardBackground).toBe('#111111')
    expect(doc.uiSettings.borderRadius).toBe(2)
    expect(doc.favorites).toEqual([{ name: 'NAS', url: 'http://nas', icon: '🗄️' }])
    expect(doc.settingsVersion).toBe('3.0')
  })
})

describe('mergeOverride', () => {
  it('starts from the defaults when nothing is stored', () => {
    expect(mergeOverride(undefined, { customName: 'Foo' })).toEqual({
      visible: true,
      customName: 'Foo',
      customUrl: '',
      icon: '🐳',
    })
  })

  it('keeps fields the patch leaves out', () => {
    const stored = { visible: false, customName: 'Wiki', customUrl: 'http://wiki.lan', icon: '📚' }
    expect(mergeOverride(stored, { customName: 'Docs' })).toEqual({ ...stored, customName: 'Docs' })
  })

  it('normalizes a patched url', () => {
    expect(mergeOverride(undefined, { customUrl: ' nas.lan ' }).customUrl).toBe('http://nas.lan')
  })
})

describe('cleanFavorites', () => {
  it('drops entries without a url and fills the icon', () => {
    expect(
      cleanFavorites([
        { name: ' Router ', url: '10.0.0.1', icon: '' },
        { name: 'Blank', url: ' ', icon: '⭐' },
      ])
    ).toEqual([{ name: 'Router', url: 'http://10.0.0.1', icon: '🌐' }])
  })
})
