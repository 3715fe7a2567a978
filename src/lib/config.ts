/**
 * Engine configuration
 *
 * The engine never falls back to hidden constants: every budget and tunable
 * arrives through an EngineConfig. Defaults live in the schema.
 */

import { readFile } from 'node:fs/promises'
import { type EngineConfig, engineConfigSchema } from '../../shared/db/json-schemas'
import { ConfigError } from './errorUtils'

/**
 * Validates raw configuration and fills in defaults.
 *
 * @throws ConfigError listing every validation issue
 */
export function parseEngineConfig(input: unknown = {}): EngineConfig {
  const result = engineConfigSchema.safeParse(input)
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    )
  }
  return result.data
}

/**
 * Loads configuration from a JSON file. A missing file yields the defaults.
 *
 * @throws ConfigError if the file is not valid JSON or fails validation
 */
export async function loadEngineConfig(path: string): Promise<EngineConfig> {
  let text: string
  try {
    text = await readFile(path, 'utf-8')
  } catch (error) {
    if (isMissingFile(error)) {
      return parseEngineConfig({})
    }
    throw error
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new ConfigError([`${path}: ${error instanceof Error ? error.message : 'invalid JSON'}`])
  }
  return parseEngineConfig(raw)
}

export function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  )
}
