export type DistroFamily = 'debian' | 'alpine' | 'rhel'
export type PackageManager = 'apt' | 'apk' | 'dnf' | 'yum'
export type LogicalPackage = 'git' | 'yadm' | 'ansible' | 'python3-pip' | 'powertop' | 'tlp'
export type OptionalPackage = Exclude<LogicalPackage, 'git' | 'yadm'>

/** An executable followed by its fixed arguments. Never a shell string. */
export interface Command {
  readonly argv: readonly string[]
  readonly cwd?: string
  readonly env?: Readonly<Record<string, string>>
}

export interface DistroProfile {
  readonly id: string
  readonly family: DistroFamily
  readonly packageManager: PackageManager
  readonly updateCommand: Command
  readonly installCommandPrefix: Command
  readonly repairCommands: readonly Command[]
}

export interface HostIdentity {
  readonly id: string
  readonly prettyName: string | undefined
  readonly fields: Readonly<Record<string, string>>
}

export interface PackageSpec {
  readonly name: string
  readonly required: boolean
  readonly description?: string
}

export type ResolvedPackage =
  | { readonly kind: 'concrete'; readonly name: string }
  | { readonly kind: 'not-applicable' }

export interface AttemptRecord {
  readonly attempt: number
  readonly ok: boolean
  readonly errorText: string
}

export type PackageOutcome =
  | { readonly status: 'installed' }
  | { readonly status: 'skipped'; readonly reason: string }
  | { readonly status: 'failed'; readonly lastError: string; readonly attemptsExhausted: boolean }

export interface LedgerEntry {
  readonly spec: PackageSpec
  readonly outcome: PackageOutcome
}

export interface LedgerSummary {
  readonly installed: number
  readonly skipped: number
  readonly failed: number
  readonly total: number
  readonly entries: readonly LedgerEntry[]
  readonly errors: readonly string[]
}

export interface HostMeta {
  readonly osName: string
  readonly kernel: string
  readonly arch: string
  readonly hostname: string
}

export interface ExecResult {
  readonly code: number | null
  readonly stdout: string
  readonly stderr: string
  readonly durationMs: number
  readonly timedOut: boolean
  readonly error?: string
}

export interface RunOptions {
  dryRun: boolean
  logger?: Logger
  timeoutMs?: number
  killGraceMs?: number
}

export type CommandRunner = (command: Command, options: RunOptions) => Promise<ExecResult>

export interface InstallerOptions {
  osReleasePath: string
  logDir: string
  optionalPackages: OptionalPackage[]
  dotfilesRepo: string | undefined
  timeoutMs: number
  dryRun: boolean
  assumeYes: boolean
}

export interface InstallerDeps {
  exec: CommandRunner
  hasCmd: (cmd: string) => Promise<boolean>
  confirm: (question: string) => Promise<boolean>
  sleep: (ms: number) => Promise<void>
  isRoot: () => boolean
  hostMeta: (identity: HostIdentity) => HostMeta
  now: () => Date
  env: NodeJS.ProcessEnv
  signals: SignalSource
  exit: (code: number) => void
  logger?: Logger
}

export interface SignalSource {
  once(signal: NodeJS.Signals, listener: () => void): unknown
  removeListener(signal: NodeJS.Signals, listener: () => void): unknown
}

export interface InstallerContext {
  logFile: string
  reportFile: string
  options: InstallerOptions
  profile: DistroProfile
  deps: InstallerDeps
  logger: Logger
}

export interface Logger {
  log: (msg: string) => void
  info: (msg: string) => void
  ok: (msg: string) => void
  warn: (msg: string) => void
  err: (msg: string) => void
  retry: (msg: string) => void
  /** Raw process output, written to the log file only. */
  transcript: (text: string) => void
}
