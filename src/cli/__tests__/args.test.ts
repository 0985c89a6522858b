import { describe, it, expect } from 'vitest'
import { getVersion, parseArgs } from '../args.js'

const argv = (...args: string[]) => ['node', 'ynab-mcp', ...args]

describe('parseArgs', () => {
  it('returns no options by default', () => {
    expect(parseArgs(argv(), '1.0.0')).toEqual({})
  })

  it('reads the serve options', () => {
    expect(
      parseArgs(argv('--config', '/etc/ynab.json', '-o', '/data/out', '--log-level', 'debug'), '1.0.0')
    ).toEqual({
      config: '/etc/ynab.json',
      outputDir: '/data/out',
      logLevel: 'debug',
    })
  })

  it('rejects unknown log levels', () => {
    expect(() => parseArgs(argv('--log-level', 'loud'), '1.0.0')).toThrow()
  })
})

describe('getVersion', () => {
  it('reads the package version', () => {
    expect(getVersion()).toMatch(/^\d+\.\d+\.\d+/)
  })
})
