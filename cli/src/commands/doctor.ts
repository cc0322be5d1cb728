import { defineCommand } from 'citty'
import { readHostIdentity, collectHostMeta, DEFAULT_OS_RELEASE } from '../installers/osRelease.js'
import { resolveProfile } from '../installers/distroProfile.js'
import { PACKAGE_CATALOG, mapName } from '../installers/packageMap.js'
import { formatCommand, needCmd } from '../installers/utils.js'
import type { DistroProfile, HostMeta } from '../installers/types.js'

export function renderDoctor(profile: DistroProfile, host: HostMeta): string {
  const lines: string[] = []
  lines.push('')
  lines.push('hostprep: Environment check')
  lines.push('────────────────────────────────')
  lines.push(`Host: ${host.hostname} (${host.osName}, kernel ${host.kernel}, ${host.arch})`)
  lines.push(`Distro: ${profile.id} → ${profile.family} via ${profile.packageManager}`)
  lines.push(`Update:  ${formatCommand(profile.updateCommand)}`)
  lines.push(`Install: ${formatCommand(profile.installCommandPrefix)} <package>`)
  lines.push(`Repair:  ${profile.repairCommands.map((c) => formatCommand(c)).join(' && ')}`)
  lines.push('')
  lines.push('Packages:')
  for (const spec of PACKAGE_CATALOG) {
    const resolved = mapName(spec.name, profile.family)
    const target = resolved.kind === 'concrete' ? resolved.name : '(not applicable)'
    lines.push(`  ${spec.required ? '*' : ' '} ${spec.name.padEnd(12)} ${target}`)
  }
  lines.push('')
  lines.push('  * required')
  lines.push('')
  return lines.join('\n')
}

export const doctorCommand = defineCommand({
  meta: { name: 'doctor', description: 'Show the detected distro and the package names it resolves to' },
  args: {
    'os-release': { type: 'string', description: 'Host identity file (default /etc/os-release)' }
  },
  async run({ args }) {
    const identity = await readHostIdentity(args['os-release'] ? String(args['os-release']) : DEFAULT_OS_RELEASE)
    const profile = await resolveProfile(identity, { hasCmd: needCmd })
    process.stdout.write(renderDoctor(profile, collectHostMeta(identity)) + '\n')
  }
})
