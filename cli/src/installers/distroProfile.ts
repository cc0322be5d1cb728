import type { Command, DistroFamily, DistroProfile, HostIdentity, PackageManager } from './types.js'
import { UnsupportedDistroError } from './errors.js'

interface ManagerCommands {
  update: Command
  install: Command
  repair: Command[]
}

const MANAGER_COMMANDS: Record<PackageManager, ManagerCommands> = {
  apt: {
    update: { argv: ['apt', 'update'] },
    install: { argv: ['apt', 'install', '-y'] },
    repair: [{ argv: ['apt', '--fix-broken', 'install', '-y'] }]
  },
  apk: {
    update: { argv: ['apk', 'update'] },
    install: { argv: ['apk', 'add'] },
    repair: [{ argv: ['apk', 'fix'] }]
  },
  dnf: {
    update: { argv: ['dnf', 'makecache'] },
    install: { argv: ['dnf', 'install', '-y'] },
    repair: [{ argv: ['dnf', 'check'] }, { argv: ['dnf', 'autoremove', '-y'] }]
  },
  yum: {
    update: { argv: ['yum', 'makecache'] },
    install: { argv: ['yum', 'install', '-y'] },
    repair: [{ argv: ['yum', 'check'] }, { argv: ['yum', 'autoremove', '-y'] }]
  }
}

const FAMILY_BY_ID: Record<string, DistroFamily> = {
  ubuntu: 'debian',
  debian: 'debian',
  alpine: 'alpine',
  rocky: 'rhel',
  rhel: 'rhel',
  centos: 'rhel',
  fedora: 'rhel',
  almalinux: 'rhel'
}

const PREFERRED_MANAGER: Record<DistroFamily, PackageManager> = {
  debian: 'apt',
  alpine: 'apk',
  rhel: 'dnf'
}

export const SUPPORTED_DISTRO_IDS = Object.keys(FAMILY_BY_ID)

export function familyOf(id: string): DistroFamily | undefined {
  const key = id.trim().toLowerCase()
  return Object.prototype.hasOwnProperty.call(FAMILY_BY_ID, key) ? FAMILY_BY_ID[key] : undefined
}

export interface ResolveOptions {
  hasCmd: (cmd: string) => Promise<boolean>
}

/**
 * Resolve the package-manager profile for a host. RHEL-like hosts fall back
 * from dnf to yum when dnf is not on PATH.
 */
export async function resolveProfile(identity: Pick<HostIdentity, 'id'>, opts: ResolveOptions): Promise<DistroProfile> {
  const family = familyOf(identity.id)
  if (!family) throw new UnsupportedDistroError(identity.id)

  let manager = PREFERRED_MANAGER[family]
  if (manager === 'dnf' && !(await opts.hasCmd('dnf'))) manager = 'yum'

  const cmds = MANAGER_COMMANDS[manager]
  return Object.freeze({
    id: identity.id,
    family,
    packageManager: manager,
    updateCommand: cmds.update,
    installCommandPrefix: cmds.install,
    repairCommands: Object.freeze([...cmds.repair])
  })
}
