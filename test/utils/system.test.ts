import { describe, expect, it } from 'vitest'
import { findExecutable, getClientVersion } from '../../src/utils/system.js'

describe('findExecutable', () => {
  it('accepts an executable path as is', () => {
    expect(findExecutable(process.execPath)).toBe(process.execPath)
  })

  it('returns null for a missing path', () => {
    expect(findExecutable('/nonexistent/bin/mariadb')).toBeNull()
  })
})

describe('getClientVersion', () => {
  it('reads the version banner', () => {
    expect(getClientVersion(process.execPath)).toBe(process.version)
  })

  it('returns null when the binary cannot run', () => {
    expect(getClientVersion('/nonexistent/bin/mariadb')).toBeNull()
  })
})
