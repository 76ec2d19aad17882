/**
 * Generator Config Tests
 */

import { describe, it, expect, afterEach } from 'vitest'
import { mkdtempSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import {
  DEFAULT_PATH_PREFIXES,
  DEFAULT_PREVIEW_LIMIT,
  loadDefaultConfig,
  loadGeneratorConfig,
  requiredFieldSet,
  resolveConfig,
} from '../../src/config/generator-config.js'
import { ConfigError } from '../../src/core/errors.js'

function writeConfig(content: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'bmrs-codegen-config-'))
  const path = join(dir, 'config.json')
  writeFileSync(path, content)
  return path
}

describe('Generator config', () => {
  afterEach(() => {
    delete process.env.BMRS_CODEGEN_CONFIG
  })

  it('loads the bundled tables', () => {
    const config = loadDefaultConfig()

    expect(config.pathPrefixes).toEqual(DEFAULT_PATH_PREFIXES)
    expect(config.previewLimit).toBe(DEFAULT_PREVIEW_LIMIT)
    expect(config.reservedWords).toContain('from')
    expect(config.mixins.multiField[0]).toEqual({
      name: 'SettlementFields',
      fields: ['settlementDate', 'settlementPeriod'],
    })
    expect(config.enums.psrType).toContain('Wind Onshore')
  })

  it('flattens the grouped allow-list', () => {
    const required = requiredFieldSet(loadDefaultConfig())

    expect(required.has('settlementPeriod')).toBe(true)
    expect(required.has('price')).toBe(true)
    expect(required.has('netImbalanceVolume')).toBe(false)
  })

  it('replaces only the keys an override names', () => {
    const config = resolveConfig({ requiredFields: { custom: ['widgetId'] }, previewLimit: 3 })

    expect(requiredFieldSet(config)).toEqual(new Set(['widgetId']))
    expect(config.previewLimit).toBe(3)
    expect(config.mixins).toEqual(loadDefaultConfig().mixins)
    expect(config.reservedWords).toEqual(loadDefaultConfig().reservedWords)
  })

  it('rejects invalid overrides with ConfigError', () => {
    expect(() => resolveConfig({ previewLimit: 0 })).toThrow(ConfigError)
    expect(() => resolveConfig({ mixins: { multiField: [{ name: 'One', fields: ['a'] }], singleField: [], behavioral: [] } })).toThrow(
      /Invalid configuration overrides: mixins\.multiField\.0\.fields/,
    )
  })

  it('rejects behavioral rules without exactly one of all and any', () => {
    const mixins = {
      multiField: [],
      singleField: [],
      behavioral: [{ name: 'Broken', all: ['a'], any: ['b'] }],
    }
    expect(() => resolveConfig({ mixins })).toThrow(ConfigError)
  })

  it('loads overrides from a file or from BMRS_CODEGEN_CONFIG', () => {
    const path = writeConfig(JSON.stringify({ pathPrefixes: ['gateway'] }))

    expect(loadGeneratorConfig(path).pathPrefixes).toEqual(['gateway'])

    process.env.BMRS_CODEGEN_CONFIG = path
    expect(loadGeneratorConfig().pathPrefixes).toEqual(['gateway'])
  })

  it('reports unreadable and malformed files', () => {
    expect(() => loadGeneratorConfig('/no/such/config.json')).toThrow(/^Could not read \/no\/such\/config\.json/)

    const path = writeConfig('{ nope')
    expect(() => loadGeneratorConfig(path)).toThrow(`${path} is not valid JSON`)
  })
})
