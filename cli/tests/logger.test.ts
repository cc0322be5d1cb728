import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { promises as fs } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'

vi.mock('@clack/prompts', () => ({
  log: {
    message: vi.fn(),
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    step: vi.fn()
  }
}))

import * as p from '@clack/prompts'
import { createLogger, formatLogLine, formatLogTimestamp } from '../src/installers/logger.js'

const fixed = () => new Date(2026, 9, 19, 8, 5, 3)

describe('log line format', () => {
  it('uses day-month-year and a level tag', () => {
    expect(formatLogTimestamp(fixed())).toBe('19-10-2026 08:05:03')
    expect(formatLogLine('RETRY', 'again', fixed())).toBe('[19-10-2026 08:05:03] [RETRY] again')
  })
})

describe('createLogger', () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'hostprep-log-'))
    vi.clearAllMocks()
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it('mirrors each level to the console and appends it to the file', async () => {
    const file = join(dir, 'nested', 'run.log')
    const logger = createLogger(file, { now: fixed })
    logger.info('Detecting Linux distribution...')
    logger.ok('git installed successfully')
    logger.err('yadm installation failed after 3 attempts')

    expect(await fs.readFile(file, 'utf8')).toBe([
      '[19-10-2026 08:05:03] [INFO] Detecting Linux distribution...',
      '[19-10-2026 08:05:03] [SUCCESS] git installed successfully',
      '[19-10-2026 08:05:03] [ERROR] yadm installation failed after 3 attempts',
      ''
    ].join('\n'))
    expect(p.log.info).toHaveBeenCalledWith('Detecting Linux distribution...')
    expect(p.log.success).toHaveBeenCalledWith('git installed successfully')
    expect(p.log.error).toHaveBeenCalledWith('yadm installation failed after 3 attempts')
  })

  it('writes transcripts to the file only, without a prefix', async () => {
    const file = join(dir, 'run.log')
    const logger = createLogger(file, { now: fixed })
    logger.transcript('$ apt update\nHit:1 http://deb.example.org stable InRelease')

    expect(await fs.readFile(file, 'utf8')).toBe('$ apt update\nHit:1 http://deb.example.org stable InRelease\n')
    expect(p.log.message).not.toHaveBeenCalled()
  })

  it('keeps the console silent in quiet mode', async () => {
    const file = join(dir, 'run.log')
    const logger = createLogger(file, { now: fixed, quiet: true })
    logger.warn('Failed to update repositories, continuing anyway...')
    logger.retry('Retrying tlp (attempt 2/3)')

    expect(p.log.warn).not.toHaveBeenCalled()
    expect(p.log.step).not.toHaveBeenCalled()
    expect(await fs.readFile(file, 'utf8')).toContain('[WARNING] Failed to update repositories, continuing anyway...\n')
  })
})
