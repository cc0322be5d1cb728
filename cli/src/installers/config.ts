import * as TOML from 'toml'
import fs from 'fs-extra'
import * as path from 'path'
import { z } from 'zod'
import { OPTIONAL_PACKAGE_NAMES } from './packageMap.js'
import { ConfigError, describeError } from './errors.js'

export const CONFIG_TEMPLATE = path.join('templates', 'hostprep.toml')

const ConfigSchema = z.object({
  report: z.object({
    dir: z.string().min(1).default('/var/log/hostprep')
  }).default({}),
  install: z.object({
    timeout_seconds: z.number().int().nonnegative().default(900)
  }).default({}),
  packages: z.object({
    optional: z.array(z.enum(OPTIONAL_PACKAGE_NAMES)).default([...OPTIONAL_PACKAGE_NAMES])
  }).default({}),
  dotfiles: z.object({
    repo: z.string().default('')
  }).default({})
})

export type HostprepConfig = z.infer<typeof ConfigSchema>

export function parseConfig(raw: string, source = 'config'): HostprepConfig {
  let data: unknown
  try {
    data = TOML.parse(raw)
  } catch (error) {
    throw new ConfigError(`Could not parse ${source}: ${describeError(error)}`, { source })
  }
  const parsed = ConfigSchema.safeParse(data)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new ConfigError(`Invalid ${source}: ${issues}`, { source })
  }
  return parsed.data
}

/**
 * Loads `explicitPath` when given, otherwise the bundled template under
 * `rootDir`. Keys missing from the file keep their defaults.
 */
export async function loadConfig(rootDir: string, explicitPath?: string): Promise<HostprepConfig> {
  const file = explicitPath ?? path.join(rootDir, CONFIG_TEMPLATE)
  if (!(await fs.pathExists(file))) {
    if (explicitPath) throw new ConfigError(`Config file not found: ${file}`, { file })
    return parseConfig('', 'defaults')
  }
  return parseConfig(await fs.readFile(file, 'utf8'), file)
}
