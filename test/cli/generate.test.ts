/**
 * Generate Command Tests
 */

import { afterEach, describe, it, expect } from 'vitest'
import { existsSync, mkdirSync, readdirSync, readFileSync, rmSync } from 'fs'
import { dirname, join } from 'path'
import { runGenerate } from '../../src/cli/commands/generate.js'
import { fixturePath } from '../support/fixtures.js'
import { captureLogger, tempDir } from './support.js'

describe('generate command', () => {
  const dirs: string[] = []

  function output(): string {
    const dir = tempDir()
    dirs.push(dir)
    return join(dir, 'client')
  }

  afterEach(() => {
    for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true })
  })

  it('writes every emitted file into the output directory', async () => {
    const { logger, lines } = captureLogger()
    const outputDir = output()

    const summary = await runGenerate(fixturePath('bmrs-sample.json'), { target: 'typescript', output: outputDir, logger })

    expect(summary.written).toBe(true)
    expect(summary.files.map((file) => file.path)).toEqual(['enums.ts', 'models.ts', 'client.ts', 'index.ts'])
    for (const file of summary.files) {
      expect(readFileSync(join(outputDir, file.path), 'utf8')).toBe(file.content)
    }
    expect(lines).toContain('Loaded: Insights.Api vv1')
    expect(lines).toContain(`✓ Generated 4 files in: ${outputDir}`)
    expect(readdirSync(dirname(outputDir))).toEqual(['client'])
  })

  it('leaves no partial output or staging directory when a write fails', async () => {
    const outputDir = output()
    // A non-empty directory where the first file should go
    mkdirSync(join(outputDir, 'enums.py', 'keep'), { recursive: true })

    await expect(
      runGenerate(fixturePath('bmrs-sample.json'), { target: 'python', output: outputDir, logger: captureLogger().logger }),
    ).rejects.toThrow()
    expect(readdirSync(outputDir)).toEqual(['enums.py'])
    expect(readdirSync(dirname(outputDir))).toEqual(['client'])
  })

  it('logs the generation notes as warnings', async () => {
    const { logger, lines } = captureLogger()
    await runGenerate(fixturePath('bmrs-sample.json'), { target: 'python', output: output(), logger })

    expect(lines).toContain('⚠ [name-collision] SystemPrice: class name SystemPrice already taken; using SystemPrice_2')
    expect(lines).toContain('⚠ [duplicate-method] get_datasets_abuc: GET /v1/datasets/abuc also maps to get_datasets_abuc; skipped')
  })

  it('writes nothing on a dry run', async () => {
    const { logger, lines } = captureLogger()
    const outputDir = output()

    const summary = await runGenerate(fixturePath('bmrs-sample.json'), {
      target: 'python',
      output: outputDir,
      dryRun: true,
      logger,
    })

    expect(summary.written).toBe(false)
    expect(existsSync(outputDir)).toBe(false)
    expect(lines).toContain(`  - ${join(outputDir, 'models.py')}`)
  })

  it('rejects unknown targets before generating anything', async () => {
    const outputDir = output()

    await expect(
      runGenerate(fixturePath('bmrs-sample.json'), { target: 'rust', output: outputDir, logger: captureLogger().logger }),
    ).rejects.toThrow('Unknown target "rust" (expected one of: python, typescript)')
    expect(existsSync(outputDir)).toBe(false)
  })

  it('writes nothing when the document is malformed', async () => {
    const outputDir = output()

    await expect(runGenerate('[]', { target: 'python', output: outputDir, logger: captureLogger().logger })).rejects.toThrow(
      'Expected a single OpenAPI document, got an array of 0 elements',
    )
    expect(existsSync(outputDir)).toBe(false)
  })
})
