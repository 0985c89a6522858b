import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { loadConfigWithEnv } from '../config-loader.js'
import { loadConfigFile } from '../config-service.js'
import { DEFAULT_OUTPUT_DIR } from '../config-types.js'

describe('config loading', () => {
  let dir: string
  let configPath: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'config-test-'))
    configPath = join(dir, 'config.json')
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  describe('loadConfigFile', () => {
    it('returns null when the file is missing', async () => {
      expect(await loadConfigFile(configPath)).toBeNull()
    })

    it('returns null for invalid json', async () => {
      await writeFile(configPath, '{ not json')

      expect(await loadConfigFile(configPath)).toBeNull()
    })

    it('parses a valid file', async () => {
      await writeFile(configPath, JSON.stringify({ ynab: { accessToken: 'test-secret' } }))

      expect(await loadConfigFile(configPath)).toEqual({ ynab: { accessToken: 'test-secret' } })
    })
  })

  describe('loadConfigWithEnv', () => {
    it('reports a missing API key', async () => {
      const result = await loadConfigWithEnv({ configPath, env: {} })

      expect(result).toEqual({ config: null, source: null, missing: ['YNAB_API_KEY'] })
    })

    it('treats an empty API key as missing', async () => {
      const result = await loadConfigWithEnv({ configPath, env: { YNAB_API_KEY: '' } })

      expect(result.missing).toEqual(['YNAB_API_KEY'])
    })

    it('loads from the environment', async () => {
      const result = await loadConfigWithEnv({
        configPath,
        env: { YNAB_API_KEY: 'test-secret', YNAB_OUTPUT_DIR: '/data/out', LOG_LEVEL: 'debug' },
      })

      expect(result).toEqual({
        config: {
          ynab: { accessToken: 'test-secret' },
          output: { directory: '/data/out' },
          logLevel: 'debug',
        },
        source: 'env',
        missing: [],
      })
    })

    it('falls back to the config file', async () => {
      await writeFile(configPath, JSON.stringify({ ynab: { accessToken: 'test-secret' } }))

      const result = await loadConfigWithEnv({ configPath, env: {} })

      expect(result.source).toBe('file')
      expect(result.config?.output.directory).toBe(DEFAULT_OUTPUT_DIR)
    })

    it('prefers env over file and reports mixed sources', async () => {
      await writeFile(
        configPath,
        JSON.stringify({ ynab: { accessToken: 'file-secret' }, output: { directory: '/from/file' } })
      )

      const result = await loadConfigWithEnv({ configPath, env: { YNAB_API_KEY: 'test-secret' } })

      expect(result.source).toBe('mixed')
      expect(result.config?.ynab.accessToken).toBe('test-secret')
      expect(result.config?.output.directory).toBe('/from/file')
    })

    it('lets flags override everything', async () => {
      const result = await loadConfigWithEnv({
        configPath,
        env: { YNAB_API_KEY: 'test-secret', YNAB_OUTPUT_DIR: '/data/out', LOG_LEVEL: 'debug' },
        overrides: { outputDir: '/flag/out', logLevel: 'warn' },
      })

      expect(result.config?.output.directory).toBe('/flag/out')
      expect(result.config?.logLevel).toBe('warn')
    })

    it('rejects an invalid log level from the environment', async () => {
      await expect(
        loadConfigWithEnv({ configPath, env: { YNAB_API_KEY: 'test-secret', LOG_LEVEL: 'loud' } })
      ).rejects.toThrow()
    })
  })
})
