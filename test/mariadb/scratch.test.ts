import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { scratchFilePath, withScratchFile } from '../../src/mariadb/scratch.js'

describe('scratchFilePath', () => {
  it('names the file after the driver id inside the directory', () => {
    expect(scratchFilePath('/var/lib/kernel', 'abc123')).toBe('/var/lib/kernel/.mariadb_statement-abc123')
  })

  it('resolves relative directories', () => {
    expect(scratchFilePath('.', 'x')).toBe(join(process.cwd(), '.mariadb_statement-x'))
  })
})

describe('withScratchFile', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'scratch-test-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('hands over a file holding the statement and a trailing newline', async () => {
    const path = scratchFilePath(dir, 'one')

    const seen = await withScratchFile(path, 'SELECT 1;', async (p) => readFileSync(p, 'utf-8'))

    expect(seen).toBe('SELECT 1;\n')
    expect(existsSync(path)).toBe(false)
  })

  it('does not add a second newline', async () => {
    const path = scratchFilePath(dir, 'two')

    const seen = await withScratchFile(path, 'SELECT 1;\nSELECT 2;\n', async (p) => readFileSync(p, 'utf-8'))

    expect(seen).toBe('SELECT 1;\nSELECT 2;\n')
  })

  it('removes the file when the callback rejects', async () => {
    const path = scratchFilePath(dir, 'three')

    await expect(
      withScratchFile(path, 'SELECT 1;', async () => {
        throw new Error('client went away')
      })
    ).rejects.toThrow('client went away')

    expect(existsSync(path)).toBe(false)
  })

  it('tolerates a callback that already removed the file', async () => {
    const path = scratchFilePath(dir, 'four')

    await withScratchFile(path, 'SELECT 1;', async (p) => {
      rmSync(p)
    })

    expect(existsSync(path)).toBe(false)
  })
})
