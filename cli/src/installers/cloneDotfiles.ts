import fs from 'fs-extra'
import * as os from 'os'
import type { Command, InstallerContext } from './types.js'
import { commandSucceeded, errorText, formatCommand } from './utils.js'

export type CloneResult = { ok: true } | { ok: false; error: string }

export interface TargetUser {
  name: string
  home: string
}

/** Home directory of `user` from passwd(5) content, if listed. */
export function lookupHome(passwd: string, user: string): string | undefined {
  for (const line of passwd.split('\n')) {
    const fields = line.split(':')
    if (fields.length >= 6 && fields[0] === user && fields[5]) return fields[5]
  }
  return undefined
}

/** The user dotfiles belong to: whoever invoked sudo, otherwise the current user. */
export function resolveTargetUser(env: NodeJS.ProcessEnv, passwd: string, current: TargetUser): TargetUser {
  const sudoUser = env.SUDO_USER
  if (sudoUser && sudoUser !== 'root') {
    const fallback = `/home/${sudoUser}`
    return { name: sudoUser, home: lookupHome(passwd, sudoUser) ?? fallback }
  }
  return current
}

export function buildCloneCommand(repo: string, target: TargetUser): Command {
  const clone = ['yadm', 'clone', '-f', repo]
  if (target.name === 'root') return { argv: clone, cwd: target.home }
  return { argv: ['sudo', '-u', target.name, '-H', ...clone], cwd: target.home }
}

async function readPasswd(file = '/etc/passwd'): Promise<string> {
  try {
    return await fs.readFile(file, 'utf8')
  } catch {
    return ''
  }
}

export async function cloneDotfiles(ctx: InstallerContext, repo: string): Promise<CloneResult> {
  const info = os.userInfo()
  const current: TargetUser = { name: info.username, home: info.homedir }
  const target = resolveTargetUser(ctx.deps.env, await readPasswd(), current)
  ctx.logger.info(`Target user: ${target.name}`)
  ctx.logger.info(`User home directory: ${target.home}`)

  if (!ctx.options.dryRun && !(await ctx.deps.hasCmd('yadm'))) {
    ctx.logger.err('yadm is not available. Cannot clone dotfiles.')
    return { ok: false, error: 'yadm is not available' }
  }

  if (target.name === 'root') {
    ctx.logger.warn('Running as root user. Cloning dotfiles to root home directory...')
  }

  const command = buildCloneCommand(repo, target)
  ctx.logger.info(`Cloning dotfiles repository: ${formatCommand(command)}`)
  const result = await ctx.deps.exec(command, { dryRun: ctx.options.dryRun, logger: ctx.logger, timeoutMs: ctx.options.timeoutMs })
  if (commandSucceeded(result)) {
    ctx.logger.ok('Dotfiles cloned successfully')
    return { ok: true }
  }

  ctx.logger.err('Failed to clone dotfiles repository')
  ctx.logger.info(`You can manually run: yadm clone ${repo}`)
  return { ok: false, error: errorText(result) || `yadm clone exited with code ${result.code}` }
}
