import { homedir } from 'node:os'
import { join } from 'node:path'
import { readFile } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { fileConfigSchema, type FileConfig } from './config-types.js'
import { createLogger } from '../shared/logger.js'

const log = createLogger('config')

const CONFIG_DIR = join(homedir(), '.config', 'ynab-mcp')
const CONFIG_FILE = join(CONFIG_DIR, 'config.json')

/**
 * Reads the config file. A missing file is not an error; an unreadable or
 * invalid one is reported and ignored.
 */
export const loadConfigFile = async (path: string = CONFIG_FILE): Promise<FileConfig | null> => {
  if (!existsSync(path)) return null

  try {
    const content = await readFile(path, 'utf-8')
    return fileConfigSchema.parse(JSON.parse(content))
  } catch (err) {
    log.warn(`Ignoring config file ${path}:`, err instanceof Error ? err.message : err)
    return null
  }
}
