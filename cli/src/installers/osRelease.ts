import fs from 'fs-extra'
import * as os from 'os'
import type { HostIdentity, HostMeta } from './types.js'
import { FatalPreconditionError } from './errors.js'

export const DEFAULT_OS_RELEASE = '/etc/os-release'

/** Parse an os-release style file into key-value pairs. */
export function parseOsRelease(content: string): Record<string, string> {
  const result: Record<string, string> = {}
  for (const raw of content.split('\n')) {
    const line = raw.trim()
    if (!line || line.startsWith('#')) continue
    const match = line.match(/^([A-Z0-9_]+)=(.*)$/)
    if (match) result[match[1]] = match[2].replace(/^["']|["']$/g, '')
  }
  return result
}

export async function readHostIdentity(file: string = DEFAULT_OS_RELEASE): Promise<HostIdentity> {
  if (!(await fs.pathExists(file))) {
    throw new FatalPreconditionError(`Cannot detect distribution - ${file} not found`, { file })
  }
  const fields = parseOsRelease(await fs.readFile(file, 'utf8'))
  const id = fields.ID?.trim()
  if (!id) {
    throw new FatalPreconditionError(`Cannot detect distribution - ${file} has no ID`, { file })
  }
  return { id, prettyName: fields.PRETTY_NAME, fields }
}

export function collectHostMeta(identity: HostIdentity): HostMeta {
  return {
    osName: identity.prettyName || identity.fields.NAME || identity.id,
    kernel: os.release(),
    arch: os.arch(),
    hostname: os.hostname()
  }
}
