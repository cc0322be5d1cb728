import { EventEmitter } from 'events'
import { vi } from 'vitest'
import type { Command, DistroProfile, ExecResult, InstallerContext, InstallerDeps, InstallerOptions, Logger } from '../src/installers/types.js'

export function ok(stdout = ''): ExecResult {
  return { code: 0, stdout, stderr: '', durationMs: 1, timedOut: false }
}

export function fail(stderr = '', code = 100): ExecResult {
  return { code, stdout: '', stderr, durationMs: 1, timedOut: false }
}

export function line(command: Command): string {
  return command.argv.join(' ')
}

export function createLoggerMock(): Logger {
  return {
    log: vi.fn(),
    info: vi.fn(),
    ok: vi.fn(),
    warn: vi.fn(),
    err: vi.fn(),
    retry: vi.fn(),
    transcript: vi.fn()
  }
}

/** Exec fake driven by a per-command-line responder; every call is kept in `calls`. */
export function createExec(respond: (cmdLine: string) => ExecResult = () => ok()) {
  const calls: string[] = []
  const exec = vi.fn(async (command: Command) => {
    const cmdLine = line(command)
    calls.push(cmdLine)
    return respond(cmdLine)
  })
  return { exec, calls }
}

export function createDeps(overrides: Partial<InstallerDeps> = {}): InstallerDeps {
  return {
    exec: vi.fn(async () => ok()),
    hasCmd: vi.fn(async () => true),
    confirm: vi.fn(async () => true),
    sleep: vi.fn(async () => {}),
    isRoot: () => true,
    hostMeta: () => ({ osName: 'Test Linux 1.0', kernel: '6.1.0-test', arch: 'x64', hostname: 'testhost' }),
    now: () => new Date('2026-10-19T08:00:00.000Z'),
    env: {},
    signals: new EventEmitter(),
    exit: vi.fn(),
    logger: createLoggerMock(),
    ...overrides
  }
}

export function createOptions(overrides: Partial<InstallerOptions> = {}): InstallerOptions {
  return {
    osReleasePath: '/etc/os-release',
    logDir: '/tmp/hostprep-test',
    optionalPackages: ['ansible', 'python3-pip', 'powertop', 'tlp'],
    dotfilesRepo: undefined,
    timeoutMs: 0,
    dryRun: false,
    assumeYes: false,
    ...overrides
  }
}

export function createCtx(profile: DistroProfile, deps: InstallerDeps = createDeps(), options: Partial<InstallerOptions> = {}): InstallerContext {
  return {
    logFile: '/tmp/hostprep-test/hostprep.log',
    reportFile: '/tmp/hostprep-test/hostprep-report.txt',
    options: createOptions(options),
    profile,
    deps,
    logger: deps.logger ?? createLoggerMock()
  }
}
