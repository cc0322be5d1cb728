import fs from 'fs-extra'
import * as path from 'path'
import type { DistroProfile, HostMeta, LedgerEntry, LedgerSummary } from './types.js'
import { isLogicalPackage, mapName } from './packageMap.js'
import { formatCommand, withArgs } from './utils.js'
import { MAX_RETRY_ATTEMPTS } from './installPackage.js'
import { ReportPersistenceError } from './errors.js'

export const DOTFILES_PSEUDO_PACKAGE = 'dotfiles'

export type RunStatus =
  | { kind: 'completed' }
  | { kind: 'interrupted'; signal: NodeJS.Signals }
  | { kind: 'aborted'; error: string }

export interface ReportInput {
  summary: LedgerSummary
  host: HostMeta
  profile: DistroProfile
  startedAt: Date
  finishedAt: Date
  status: RunStatus
  logFile: string
  reportFile: string
  dotfilesRepo?: string
}

const RULE = '────────────────────────────────────────────────────────'

function section(title: string, body: string[]): string[] {
  return ['', title, RULE, ...body]
}

function orNone(lines: string[], none = 'None'): string[] {
  return lines.length ? lines : [`  ${none}`]
}

function describeStatus(status: RunStatus): string {
  switch (status.kind) {
    case 'completed': return 'completed'
    case 'interrupted': return `interrupted by ${status.signal}`
    case 'aborted': return `aborted: ${status.error}`
  }
}

function formatDuration(ms: number): string {
  const total = Math.max(0, Math.round(ms / 1000))
  const minutes = Math.floor(total / 60)
  const seconds = total % 60
  return minutes ? `${minutes}m ${seconds}s` : `${seconds}s`
}

function failedLine(entry: LedgerEntry): string {
  if (entry.outcome.status !== 'failed') return ''
  const note = entry.outcome.attemptsExhausted ? `gave up after ${MAX_RETRY_ATTEMPTS} attempts` : 'not retried'
  return `  ✗ ${entry.spec.name} (${note})`
}

function manualCommand(name: string, input: ReportInput): string {
  if (name === DOTFILES_PSEUDO_PACKAGE) {
    return `yadm clone ${input.dotfilesRepo || '<repository-url>'}`
  }
  let concrete = name
  if (isLogicalPackage(name)) {
    const resolved = mapName(name, input.profile.family)
    if (resolved.kind === 'concrete') concrete = resolved.name
  }
  return formatCommand(withArgs(input.profile.installCommandPrefix, concrete))
}

function troubleshooting(input: ReportInput): string[] {
  const failed = input.summary.entries.filter((e) => e.outcome.status === 'failed')
  if (!failed.length) return ['  No troubleshooting needed']
  const repair = input.profile.repairCommands.map((c) => formatCommand(c)).join(' && ')
  return [
    `  1. Refresh package repositories:   ${formatCommand(input.profile.updateCommand)}`,
    `  2. Repair broken packages:         ${repair}`,
    '  3. Retry the failed steps manually:',
    ...failed.map((e) => `       ${manualCommand(e.spec.name, input)}`),
    `  4. Review the full log:            ${input.logFile}`
  ]
}

/** Pure rendering of a finished (or interrupted) run. */
export function renderReport(input: ReportInput): string {
  const { summary, host, profile } = input
  const byStatus = (status: LedgerEntry['outcome']['status']) =>
    summary.entries.filter((e) => e.outcome.status === status)

  const lines: string[] = [
    'hostprep: Provisioning report',
    '════════════════════════════════════════════════════════',
    ...section('EXECUTION SUMMARY', [
      `  Status:     ${describeStatus(input.status)}`,
      `  Started:    ${input.startedAt.toISOString()}`,
      `  Finished:   ${input.finishedAt.toISOString()}`,
      `  Duration:   ${formatDuration(input.finishedAt.getTime() - input.startedAt.getTime())}`,
      `  Installed:  ${summary.installed}`,
      `  Skipped:    ${summary.skipped}`,
      `  Failed:     ${summary.failed}`,
      `  Total:      ${summary.total}`
    ]),
    ...section('SYSTEM INFORMATION', [
      `  OS:              ${host.osName}`,
      `  Distro ID:       ${profile.id}`,
      `  Family:          ${profile.family}`,
      `  Package manager: ${profile.packageManager}`,
      `  Kernel:          ${host.kernel}`,
      `  Architecture:    ${host.arch}`,
      `  Hostname:        ${host.hostname}`
    ]),
    ...section('FAILED PACKAGES', orNone(byStatus('failed').map(failedLine))),
    ...section('SKIPPED PACKAGES', orNone(byStatus('skipped').map((e) =>
      `  - ${e.spec.name}: ${e.outcome.status === 'skipped' ? e.outcome.reason : ''}`))),
    ...section('SUCCESSFUL PACKAGES', orNone(byStatus('installed').map((e) => `  ✓ ${e.spec.name}`))),
    ...section('ERROR DETAILS', orNone(summary.errors.map((e) => `  - ${e}`), 'No specific errors recorded')),
    ...section('TROUBLESHOOTING', troubleshooting(input)),
    ...section('OUTPUT FILES', [
      `  Log:    ${input.logFile}`,
      `  Report: ${input.reportFile}`
    ])
  ]
  return lines.join('\n') + '\n'
}

/** Synchronous so it can run from a signal handler right before exit. */
export function writeReport(file: string, text: string): void {
  try {
    fs.ensureDirSync(path.dirname(file))
    fs.writeFileSync(file, text, 'utf8')
  } catch (error) {
    throw new ReportPersistenceError(file, error)
  }
}
