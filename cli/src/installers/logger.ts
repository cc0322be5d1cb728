import * as p from '@clack/prompts'
import fs from 'fs-extra'
import * as path from 'path'
import type { Logger } from './types.js'

export type LogLevel = 'LOG' | 'INFO' | 'SUCCESS' | 'WARNING' | 'ERROR' | 'RETRY'

function pad(n: number): string {
  return String(n).padStart(2, '0')
}

export function formatLogTimestamp(date: Date): string {
  return `${pad(date.getDate())}-${pad(date.getMonth() + 1)}-${date.getFullYear()} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
}

export function formatLogLine(level: LogLevel, message: string, date: Date): string {
  return `[${formatLogTimestamp(date)}] [${level}] ${message}`
}

export interface LoggerOptions {
  quiet?: boolean
  now?: () => Date
}

/**
 * Console output goes through clack's log helpers; every message is also
 * appended to `logFile` with a timestamp and level tag.
 */
export function createLogger(logFile: string, options: LoggerOptions = {}): Logger {
  const now = options.now ?? (() => new Date())
  fs.ensureDirSync(path.dirname(logFile))

  const write = (level: LogLevel, msg: string) => {
    fs.appendFileSync(logFile, formatLogLine(level, msg, now()) + '\n', 'utf8')
  }
  const show = (fn: (msg: string) => void, msg: string) => {
    if (!options.quiet) fn(msg)
  }

  return {
    log: (msg) => { write('LOG', msg); show(p.log.message, msg) },
    info: (msg) => { write('INFO', msg); show(p.log.info, msg) },
    ok: (msg) => { write('SUCCESS', msg); show(p.log.success, msg) },
    warn: (msg) => { write('WARNING', msg); show(p.log.warn, msg) },
    err: (msg) => { write('ERROR', msg); show(p.log.error, msg) },
    retry: (msg) => { write('RETRY', msg); show(p.log.step, msg) },
    transcript: (text) => { fs.appendFileSync(logFile, text + '\n', 'utf8') }
  }
}
