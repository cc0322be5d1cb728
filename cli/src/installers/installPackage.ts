import type { AttemptRecord, InstallerContext, PackageOutcome } from './types.js'
import type { CatalogEntry } from './packageMap.js'
import { mapName } from './packageMap.js'
import { commandSucceeded, errorText, formatCommand, withArgs } from './utils.js'

export const MAX_RETRY_ATTEMPTS = 3
export const RETRY_DELAY_MS = 2000
export const NOT_APPLICABLE_REASON = 'not applicable for distro'

export interface InstallResult {
  outcome: PackageOutcome
  attempts: AttemptRecord[]
}

export async function installPackage(spec: CatalogEntry, ctx: InstallerContext): Promise<InstallResult> {
  const resolved = mapName(spec.name, ctx.profile.family)
  if (resolved.kind === 'not-applicable') {
    ctx.logger.warn(`${spec.name} is not available on ${ctx.profile.id}; skipping`)
    return { outcome: { status: 'skipped', reason: NOT_APPLICABLE_REASON }, attempts: [] }
  }

  const command = withArgs(ctx.profile.installCommandPrefix, resolved.name)
  const runOpts = { dryRun: ctx.options.dryRun, logger: ctx.logger, timeoutMs: ctx.options.timeoutMs }
  const attempts: AttemptRecord[] = []

  for (let attempt = 1; attempt <= MAX_RETRY_ATTEMPTS; attempt++) {
    ctx.logger.info(`Installing ${spec.name} (attempt ${attempt}/${MAX_RETRY_ATTEMPTS}): ${formatCommand(command)}`)
    const result = await ctx.deps.exec(command, runOpts)

    if (commandSucceeded(result)) {
      attempts.push({ attempt, ok: true, errorText: '' })
      ctx.logger.ok(`${spec.name} installed successfully`)
      return { outcome: { status: 'installed' }, attempts }
    }

    const text = errorText(result)
    attempts.push({ attempt, ok: false, errorText: text })

    if (attempt < MAX_RETRY_ATTEMPTS) {
      ctx.logger.retry(`${spec.name} installation failed, retrying in ${RETRY_DELAY_MS / 1000}s...`)
      await repair(ctx, attempt)
      await refresh(ctx, attempt)
      await ctx.deps.sleep(RETRY_DELAY_MS)
    }
  }

  const last = attempts[attempts.length - 1]
  ctx.logger.err(`${spec.name} installation failed after ${MAX_RETRY_ATTEMPTS} attempts`)
  return {
    outcome: { status: 'failed', lastError: last ? last.errorText : '', attemptsExhausted: true },
    attempts
  }
}

/** Best-effort repair of broken package-manager state. Stops at the first failing step. */
export async function repair(ctx: InstallerContext, attempt: number): Promise<boolean> {
  ctx.logger.info(`Attempting to fix broken packages (after attempt ${attempt})...`)
  for (const command of ctx.profile.repairCommands) {
    const result = await ctx.deps.exec(command, { dryRun: ctx.options.dryRun, logger: ctx.logger, timeoutMs: ctx.options.timeoutMs })
    if (!commandSucceeded(result)) {
      ctx.logger.warn(`Package repair had issues (${formatCommand(command)}), continuing...`)
      return false
    }
  }
  ctx.logger.ok('Package repair completed successfully')
  return true
}

/** Best-effort repository refresh. */
export async function refresh(ctx: InstallerContext, attempt?: number): Promise<boolean> {
  const suffix = attempt === undefined ? '' : ` (after attempt ${attempt})`
  ctx.logger.info(`Updating package repositories${suffix}...`)
  const result = await ctx.deps.exec(ctx.profile.updateCommand, { dryRun: ctx.options.dryRun, logger: ctx.logger, timeoutMs: ctx.options.timeoutMs })
  if (commandSucceeded(result)) {
    ctx.logger.ok('Package repositories updated successfully')
    return true
  }
  ctx.logger.warn('Failed to update repositories, continuing anyway...')
  return false
}
