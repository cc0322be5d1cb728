import { defineCommand } from 'citty'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import fs from 'fs-extra'
import * as p from '@clack/prompts'
import { runProvisioner } from '../installers/main.js'
import { loadConfig } from '../installers/config.js'
import { DEFAULT_OS_RELEASE } from '../installers/osRelease.js'
import { describeError, isFatal } from '../installers/errors.js'
import type { InstallerOptions } from '../installers/types.js'

const __dirname = dirname(fileURLToPath(import.meta.url))
export function findRoot(start: string = __dirname): string {
  // Walk up to 6 levels looking for templates/hostprep.toml
  let cur = start
  for (let i = 0; i < 6; i++) {
    if (fs.pathExistsSync(resolve(cur, 'templates', 'hostprep.toml'))) return cur
    cur = resolve(cur, '..')
  }
  return resolve(start, '..')
}

export const provisionCommand = defineCommand({
  meta: {
    name: 'provision',
    description: 'Install the base packages for this distro, clone dotfiles and write a report'
  },
  args: {
    yes: { type: 'boolean', description: 'Non-interactive; accept every optional package' },
    'dry-run': { type: 'boolean', description: 'Print package-manager commands without running them' },
    config: { type: 'string', description: 'Path to a hostprep.toml' },
    'log-dir': { type: 'string', description: 'Directory for the log and report files' },
    dotfiles: { type: 'string', description: 'Dotfiles repository URL cloned with yadm; without it (or [dotfiles] repo) no clone is offered' },
    'os-release': { type: 'string', description: 'Host identity file (default /etc/os-release)' }
  },
  async run({ args }) {
    const config = await loadConfig(findRoot(), args.config ? String(args.config) : undefined)
    const options: InstallerOptions = {
      osReleasePath: args['os-release'] ? String(args['os-release']) : DEFAULT_OS_RELEASE,
      logDir: args['log-dir'] ? String(args['log-dir']) : config.report.dir,
      optionalPackages: config.packages.optional,
      dotfilesRepo: (args.dotfiles ? String(args.dotfiles) : config.dotfiles.repo) || undefined,
      timeoutMs: config.install.timeout_seconds * 1000,
      dryRun: args['dry-run'] || false,
      assumeYes: args.yes || false
    }

    p.intro('hostprep · Provision')
    try {
      const result = await runProvisioner(options)
      process.exitCode = result.exitCode
      if (result.exitCode === 0) p.outro(`Provisioning finished. Report: ${result.reportFile}`)
      else p.outro(`Provisioning finished with ${result.summary.failed} failure(s). Report: ${result.reportFile}`)
    } catch (error) {
      p.cancel(`Provisioning failed: ${describeError(error)}`)
      process.exitCode = 1
      if (!isFatal(error)) throw error
    }
  }
})
