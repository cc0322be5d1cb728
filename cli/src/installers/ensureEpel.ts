import type { InstallerContext } from './types.js'
import { commandSucceeded, withArgs } from './utils.js'

export const EPEL_PACKAGE = 'epel-release'

/**
 * yadm and several optional packages live in EPEL on RHEL-like hosts.
 * Installs epel-release when rpm does not know it; every failure is ignored.
 */
export async function ensureEpel(ctx: InstallerContext): Promise<void> {
  if (ctx.profile.family !== 'rhel') return

  const runOpts = { dryRun: ctx.options.dryRun, logger: ctx.logger, timeoutMs: ctx.options.timeoutMs }
  const query = await ctx.deps.exec({ argv: ['rpm', '-q', EPEL_PACKAGE] }, runOpts)
  if (commandSucceeded(query)) {
    ctx.logger.info('EPEL repository already present')
    return
  }

  ctx.logger.info('Installing EPEL repository...')
  const install = await ctx.deps.exec(withArgs(ctx.profile.installCommandPrefix, EPEL_PACKAGE), runOpts)
  if (commandSucceeded(install)) ctx.logger.ok('EPEL repository installed')
  else ctx.logger.warn('Could not install EPEL repository, continuing anyway...')
}
