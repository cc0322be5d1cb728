import { which } from 'zx'
import { spawn } from 'node:child_process'
import type { Command, ExecResult, RunOptions } from './types.js'

export async function needCmd(cmd: string): Promise<boolean> {
  try {
    await which(cmd)
    return true
  } catch {
    return false
  }
}

export function formatCommand(command: Command, extra: readonly string[] = []): string {
  return [...command.argv, ...extra].map((a) => (a.includes(' ') ? `"${a}"` : a)).join(' ')
}

export function withArgs(command: Command, ...args: string[]): Command {
  return { ...command, argv: [...command.argv, ...args] }
}

export const KILL_GRACE_MS = 5000

/**
 * Runs one external process without a shell. Never rejects: a spawn error,
 * a nonzero exit and a timeout all come back as a result with `code !== 0`.
 * A timed-out process gets SIGTERM, then SIGKILL after `killGraceMs`; the
 * result is returned at that point whether or not the process has closed.
 */
export async function runCommand(command: Command, options: RunOptions = { dryRun: false }): Promise<ExecResult> {
  const [cmd, ...args] = command.argv
  if (!cmd) throw new Error('runCommand: empty argv')

  if (options.dryRun) {
    options.logger?.log(`[dry-run] ${formatCommand(command)}`)
    return { code: 0, stdout: '', stderr: '', durationMs: 0, timedOut: false }
  }

  const start = Date.now()
  return new Promise<ExecResult>((resolve) => {
    const proc = spawn(cmd, args, {
      cwd: command.cwd || process.cwd(),
      env: { ...process.env, ...(command.env || {}) },
      stdio: ['ignore', 'pipe', 'pipe'],
      shell: false
    })

    let stdout = ''
    let stderr = ''
    let timedOut = false
    let settled = false
    const timers: NodeJS.Timeout[] = []

    proc.stdout.on('data', (d: Buffer) => (stdout += d.toString()))
    proc.stderr.on('data', (d: Buffer) => (stderr += d.toString()))

    const finish = (code: number | null, error?: string) => {
      if (settled) return
      settled = true
      for (const t of timers) clearTimeout(t)
      const output = [stdout, stderr].filter(Boolean).join('\n').trimEnd()
      if (output) options.logger?.transcript(`$ ${formatCommand(command)}\n${output}`)
      resolve({ code, stdout, stderr, durationMs: Date.now() - start, timedOut, error })
    }

    if (typeof options.timeoutMs === 'number' && options.timeoutMs > 0) {
      const grace = options.killGraceMs ?? KILL_GRACE_MS
      timers.push(setTimeout(() => {
        timedOut = true
        proc.kill('SIGTERM')
        timers.push(setTimeout(() => {
          proc.kill('SIGKILL')
          finish(null)
        }, grace))
      }, options.timeoutMs))
    }

    proc.on('error', (err) => finish(null, String(err)))
    proc.on('close', (code) => finish(code))
  })
}

export function commandSucceeded(result: ExecResult): boolean {
  return result.code === 0 && !result.timedOut
}

/** Best diagnostic a failed process left behind; empty when the tool was silent. */
export function errorText(result: ExecResult): string {
  if (result.timedOut) return `timed out after ${result.durationMs}ms`
  if (result.error) return result.error
  const stderr = result.stderr.trim()
  if (stderr) return lastLines(stderr)
  return lastLines(result.stdout.trim())
}

function lastLines(text: string, count = 5): string {
  return text.split('\n').slice(-count).join('\n')
}

export function createRunStamp(date: Date): string {
  return date.toISOString().replace(/[:.]/g, '-').slice(0, -5)
}
