import { describe, it, expect, vi } from 'vitest'
import { installPackage, repair, refresh, MAX_RETRY_ATTEMPTS, RETRY_DELAY_MS, NOT_APPLICABLE_REASON } from '../src/installers/installPackage.js'
import { resolveProfile } from '../src/installers/distroProfile.js'
import { REQUIRED_PACKAGES, OPTIONAL_PACKAGES } from '../src/installers/packageMap.js'
import type { CatalogEntry } from '../src/installers/packageMap.js'
import type { ExecResult } from '../src/installers/types.js'
import { createCtx, createDeps, createExec, fail, ok } from './helpers.js'

const hasDnf = { hasCmd: async () => true }

function spec(name: string): CatalogEntry {
  const found = [...REQUIRED_PACKAGES, ...OPTIONAL_PACKAGES].find((s) => s.name === name)
  if (!found) throw new Error(`unknown package ${name}`)
  return found
}

describe('installPackage', () => {
  it('returns installed after one attempt when the first install succeeds', async () => {
    const { exec, calls } = createExec()
    const deps = createDeps({ exec })
    const ctx = createCtx(await resolveProfile({ id: 'ubuntu' }, hasDnf), deps)

    const result = await installPackage(spec('git'), ctx)

    expect(result.outcome).toEqual({ status: 'installed' })
    expect(result.attempts).toEqual([{ attempt: 1, ok: true, errorText: '' }])
    expect(calls).toEqual(['apt install -y git'])
    expect(deps.sleep).not.toHaveBeenCalled()
  })

  it('repairs, refreshes and waits between attempts, stopping at the first success', async () => {
    let installs = 0
    const { exec, calls } = createExec((cmd) => {
      if (cmd === 'apt install -y git') {
        installs++
        return installs < 3 ? fail(`E: attempt ${installs} failed`) : ok()
      }
      return ok()
    })
    const deps = createDeps({ exec })
    const ctx = createCtx(await resolveProfile({ id: 'ubuntu' }, hasDnf), deps)

    const result = await installPackage(spec('git'), ctx)

    expect(result.outcome).toEqual({ status: 'installed' })
    expect(result.attempts).toEqual([
      { attempt: 1, ok: false, errorText: 'E: attempt 1 failed' },
      { attempt: 2, ok: false, errorText: 'E: attempt 2 failed' },
      { attempt: 3, ok: true, errorText: '' }
    ])
    expect(calls).toEqual([
      'apt install -y git',
      'apt --fix-broken install -y',
      'apt update',
      'apt install -y git',
      'apt --fix-broken install -y',
      'apt update',
      'apt install -y git'
    ])
    expect(deps.sleep).toHaveBeenCalledTimes(2)
    expect(deps.sleep).toHaveBeenCalledWith(RETRY_DELAY_MS)
  })

  it('gives up after the retry budget and keeps the last error', async () => {
    const { exec, calls } = createExec((cmd) =>
      cmd.startsWith('dnf install') ? fail('Error: Unable to find a match: yadm') : ok()
    )
    const deps = createDeps({ exec })
    const ctx = createCtx(await resolveProfile({ id: 'centos' }, hasDnf), deps)

    const result = await installPackage(spec('yadm'), ctx)

    expect(result.outcome).toEqual({
      status: 'failed',
      lastError: 'Error: Unable to find a match: yadm',
      attemptsExhausted: true
    })
    expect(calls.filter((c) => c === 'dnf install -y yadm')).toHaveLength(MAX_RETRY_ATTEMPTS)
    // repair and refresh only between attempts, never after the last one
    expect(calls.filter((c) => c === 'dnf check')).toHaveLength(2)
    expect(calls.filter((c) => c === 'dnf makecache')).toHaveLength(2)
    expect(calls[calls.length - 1]).toBe('dnf install -y yadm')
    expect(deps.sleep).toHaveBeenCalledTimes(2)
    expect(ctx.logger.err).toHaveBeenCalledWith('yadm installation failed after 3 attempts')
  })

  it('runs the second repair step only when the first succeeds', async () => {
    const { exec, calls } = createExec((cmd) => (cmd === 'dnf check' ? fail('broken rpmdb') : ok()))
    const ctx = createCtx(await resolveProfile({ id: 'rocky' }, hasDnf), createDeps({ exec }))

    expect(await repair(ctx, 1)).toBe(false)
    expect(calls).toEqual(['dnf check'])
  })

  it('reports refresh failures without throwing', async () => {
    const { exec } = createExec(() => fail('network unreachable'))
    const ctx = createCtx(await resolveProfile({ id: 'alpine' }, hasDnf), createDeps({ exec }))

    expect(await refresh(ctx)).toBe(false)
    expect(ctx.logger.warn).toHaveBeenCalledWith('Failed to update repositories, continuing anyway...')
  })

  it('skips packages that do not exist on the distro without running anything', async () => {
    const { exec } = createExec()
    const deps = createDeps({ exec })
    const ctx = createCtx(await resolveProfile({ id: 'alpine' }, hasDnf), deps)

    const result = await installPackage(spec('tlp'), ctx)

    expect(result.outcome).toEqual({ status: 'skipped', reason: NOT_APPLICABLE_REASON })
    expect(result.attempts).toEqual([])
    expect(exec).not.toHaveBeenCalled()
    expect(deps.sleep).not.toHaveBeenCalled()
  })

  it('installs the distro-specific package name', async () => {
    const { exec, calls } = createExec()
    const ctx = createCtx(await resolveProfile({ id: 'alpine' }, hasDnf), createDeps({ exec }))

    await installPackage(spec('python3-pip'), ctx)

    expect(calls).toEqual(['apk add py3-pip'])
  })

  it('counts a timed-out attempt as a failure', async () => {
    const timedOut: ExecResult = { code: null, stdout: '', stderr: '', durationMs: 50, timedOut: true }
    const exec = vi.fn(async () => timedOut)
    const ctx = createCtx(await resolveProfile({ id: 'debian' }, hasDnf), createDeps({ exec }), { timeoutMs: 50 })

    const result = await installPackage(spec('git'), ctx)

    expect(result.outcome).toEqual({ status: 'failed', lastError: 'timed out after 50ms', attemptsExhausted: true })
    expect(exec).toHaveBeenCalledWith({ argv: ['apt', 'install', '-y', 'git'] }, expect.objectContaining({ timeoutMs: 50 }))
  })

  it('passes dry-run through to the command runner', async () => {
    const { exec } = createExec()
    const ctx = createCtx(await resolveProfile({ id: 'debian' }, hasDnf), createDeps({ exec }), { dryRun: true })

    await installPackage(spec('git'), ctx)

    expect(exec).toHaveBeenCalledWith({ argv: ['apt', 'install', '-y', 'git'] }, expect.objectContaining({ dryRun: true }))
  })
})
