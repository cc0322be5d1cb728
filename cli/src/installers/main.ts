import * as path from 'path'
import * as p from '@clack/prompts'
import { sleep } from 'zx'
import type { HostIdentity, InstallerContext, InstallerDeps, InstallerOptions, LedgerSummary, Logger, PackageOutcome, PackageSpec } from './types.js'
import { readHostIdentity, collectHostMeta } from './osRelease.js'
import { resolveProfile } from './distroProfile.js'
import { OPTIONAL_PACKAGES, REQUIRED_PACKAGES } from './packageMap.js'
import { installPackage, refresh } from './installPackage.js'
import { ensureEpel } from './ensureEpel.js'
import { OutcomeLedger } from './ledger.js'
import { cloneDotfiles } from './cloneDotfiles.js'
import { DOTFILES_PSEUDO_PACKAGE, renderReport, writeReport } from './report.js'
import type { RunStatus } from './report.js'
import { createFinalizer } from './finalizer.js'
import { createConfirm } from './prompt.js'
import { createLogger } from './logger.js'
import { FatalPreconditionError, describeError } from './errors.js'
import { createRunStamp, needCmd, runCommand } from './utils.js'

export const DECLINED_REASON = 'declined by user'
export const NO_REPO_REASON = 'no repository configured'

const DOTFILES_SPEC: PackageSpec = { name: DOTFILES_PSEUDO_PACKAGE, required: false, description: 'Dotfiles clone' }

export interface ProvisionResult {
  exitCode: number
  summary: LedgerSummary
  logFile: string
  reportFile: string
}

export function defaultDeps(options: InstallerOptions): InstallerDeps {
  return {
    exec: runCommand,
    hasCmd: needCmd,
    confirm: createConfirm({ assumeYes: options.assumeYes, interactive: Boolean(process.stdin.isTTY) }),
    sleep: async (ms) => { await sleep(ms) },
    isRoot: () => process.getuid?.() === 0,
    hostMeta: collectHostMeta,
    now: () => new Date(),
    env: process.env,
    signals: process,
    exit: (code) => process.exit(code)
  }
}

export async function runProvisioner(
  options: InstallerOptions,
  overrides: Partial<InstallerDeps> = {}
): Promise<ProvisionResult> {
  const deps: InstallerDeps = { ...defaultDeps(options), ...overrides }
  const startedAt = deps.now()
  const stamp = createRunStamp(startedAt)
  const logFile = path.join(options.logDir, `hostprep-${stamp}.log`)
  const reportFile = path.join(options.logDir, `hostprep-report-${stamp}.txt`)

  // Runs before the log directory is touched.
  if (!deps.isRoot() && !options.dryRun) {
    const message = 'This command must be run as root or with sudo privileges'
    if (deps.logger) deps.logger.err(message)
    else p.log.error(message)
    throw new FatalPreconditionError('Root privileges required; re-run with sudo')
  }

  const logger: Logger = deps.logger ?? openLog(logFile, options.logDir)

  logger.info('Starting host provisioning')
  logger.info(`User: ${deps.env.SUDO_USER ?? deps.env.USER ?? 'unknown'}`)
  logger.info(`Working directory: ${process.cwd()}`)
  if (deps.isRoot()) logger.ok('Running with appropriate privileges')
  else logger.warn('Not running as root; continuing because this is a dry run')

  logger.info('Detecting Linux distribution...')
  let identity: HostIdentity
  try {
    identity = await readHostIdentity(options.osReleasePath)
  } catch (error) {
    logger.err(describeError(error))
    throw error
  }
  const profile = await resolveProfile(identity, { hasCmd: deps.hasCmd }).catch((error: unknown) => {
    logger.err(describeError(error))
    throw error
  })
  logger.ok(`Detected distribution: ${profile.id} (${profile.family}, using ${profile.packageManager})`)

  const ctx: InstallerContext = { logFile, reportFile, options, profile, deps, logger }
  const ledger = new OutcomeLedger()
  const host = deps.hostMeta(identity)

  const finalizer = createFinalizer((status: RunStatus) => {
    const text = renderReport({
      summary: ledger.summary(),
      host,
      profile,
      startedAt,
      finishedAt: deps.now(),
      status,
      logFile,
      reportFile,
      dotfilesRepo: options.dotfilesRepo
    })
    writeReport(reportFile, text)
    logger.info(`Report written to ${reportFile}`)
  }, { signals: deps.signals, exit: deps.exit })
  finalizer.arm()

  try {
    await provision(ctx, ledger)
  } catch (error) {
    logger.err(`Provisioning aborted: ${describeError(error)}`)
    ledger.addError(`aborted: ${describeError(error)}`)
    finalizer.run({ kind: 'aborted', error: describeError(error) })
    throw error
  }
  finalizer.run({ kind: 'completed' })

  const summary = ledger.summary()
  logSummary(logger, summary)
  return { exitCode: summary.failed === 0 ? 0 : 1, summary, logFile, reportFile }
}

async function provision(ctx: InstallerContext, ledger: OutcomeLedger): Promise<void> {
  const record = (spec: PackageSpec, outcome: PackageOutcome) => ledger.record(spec, outcome)

  ctx.logger.info('Performing initial repository update...')
  await refresh(ctx)
  await ensureEpel(ctx)

  ctx.logger.info('Installing required packages...')
  for (const spec of REQUIRED_PACKAGES) {
    record(spec, (await installPackage(spec, ctx)).outcome)
  }

  ctx.logger.info('Checking optional packages...')
  const wanted = new Set(ctx.options.optionalPackages)
  for (const spec of OPTIONAL_PACKAGES.filter((s) => wanted.has(s.name))) {
    if (await ctx.deps.confirm(`Want to install ${spec.name}?`)) {
      record(spec, (await installPackage(spec, ctx)).outcome)
    } else {
      ctx.logger.info(`Skipping ${spec.name} installation`)
      record(spec, { status: 'skipped', reason: DECLINED_REASON })
    }
  }

  record(DOTFILES_SPEC, await dotfilesOutcome(ctx))
}

async function dotfilesOutcome(ctx: InstallerContext): Promise<PackageOutcome> {
  const repo = ctx.options.dotfilesRepo
  if (!repo) {
    ctx.logger.info('No dotfiles repository configured (set --dotfiles or [dotfiles] repo); skipping dotfiles')
    return { status: 'skipped', reason: NO_REPO_REASON }
  }
  ctx.logger.info('Setting up dotfiles with yadm...')
  if (!(await ctx.deps.confirm(`Want to clone dotfiles from ${repo}?`))) {
    ctx.logger.info('Skipping dotfiles installation')
    return { status: 'skipped', reason: DECLINED_REASON }
  }
  const result = await cloneDotfiles(ctx, repo)
  return result.ok
    ? { status: 'installed' }
    : { status: 'failed', lastError: result.error, attemptsExhausted: false }
}

function openLog(logFile: string, logDir: string): Logger {
  try {
    return createLogger(logFile)
  } catch (error) {
    throw new FatalPreconditionError(
      `Cannot write logs to ${logDir}: ${describeError(error)}; pass --log-dir to use another directory`,
      { logDir }
    )
  }
}

function logSummary(logger: Logger, summary: LedgerSummary): void {
  if (summary.failed === 0) {
    logger.ok('All requested packages installed successfully!')
  } else {
    const failed = summary.entries.filter((e) => e.outcome.status === 'failed').map((e) => e.spec.name)
    logger.warn(`Installation completed with some failures: ${failed.join(', ')}`)
  }
  logger.info(`Installed ${summary.installed}, skipped ${summary.skipped}, failed ${summary.failed}`)
}
