/**
 * Validate Command Tests
 */

import { afterEach, describe, it, expect } from 'vitest'
import { readFileSync, rmSync, writeFileSync } from 'fs'
import { join } from 'path'
import { runValidate } from '../../src/cli/commands/validate.js'
import { fixturePath } from '../support/fixtures.js'
import { captureLogger, tempDir } from './support.js'

const EXISTING_CLIENT = `class BmrsClient:
    def get_system_prices(self, settlement_date):
        """System prices for one day."""
        return self._make_request("GET", "/balancing/settlement/system-prices/" + settlement_date)

    def fetch_abuc(self):
        return self._make_request("GET", "/datasets/abuc")

    def _make_request(self, method, path):
        raise NotImplementedError
`

describe('validate command', () => {
  let dir = ''

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true })
  })

  function writeExisting(): string {
    dir = tempDir()
    const path = join(dir, 'client.py')
    writeFileSync(path, EXISTING_CLIENT)
    return path
  }

  it('reports missing endpoints and undocumented methods', async () => {
    const { logger, lines } = captureLogger()
    const { result, report } = await runValidate(fixturePath('bmrs-sample.json'), {
      existing: writeExisting(),
      target: 'python',
      logger,
    })

    expect(result.missing.map((endpoint) => endpoint.path)).toEqual([
      '/bmrs/api/v1/balancing/settlement/system-prices/{settlementDate}',
      '/reference/abuc-rows',
    ])
    expect(result.undocumented).toEqual(['fetch_abuc'])
    expect(result.methodsOnlyInExisting).toEqual(['fetch_abuc'])
    expect(report.split('\n').slice(5, 8)).toEqual([
      '  - Spec endpoints: 5',
      '  - Client methods: 2',
      '  - Generated methods: 4',
    ])
    expect(lines).toEqual([report])
  })

  it('writes the report file and honours the preview size', async () => {
    const existing = writeExisting()
    const reportPath = join(dir, 'reports', 'validation.txt')

    const { report } = await runValidate(fixturePath('bmrs-sample.json'), {
      existing,
      target: 'python',
      report: reportPath,
      preview: '1',
      logger: captureLogger().logger,
    })

    expect(readFileSync(reportPath, 'utf8')).toBe(`${report}\n`)
    expect(report.split('\n')).toContain('  ... and 1 more')
  })

  it('fails on an unreadable client file', async () => {
    dir = tempDir()
    const missing = join(dir, 'nope.py')

    await expect(
      runValidate(fixturePath('bmrs-sample.json'), { existing: missing, target: 'python', logger: captureLogger().logger }),
    ).rejects.toThrow(`Could not read existing client ${missing}`)
  })

  it('rejects a preview size that is not a positive integer', async () => {
    await expect(
      runValidate(fixturePath('bmrs-sample.json'), {
        existing: writeExisting(),
        target: 'python',
        preview: '0',
        logger: captureLogger().logger,
      }),
    ).rejects.toThrow('--preview must be a positive integer, got "0"')
  })
})
