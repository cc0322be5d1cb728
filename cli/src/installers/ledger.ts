import type { LedgerEntry, LedgerSummary, PackageOutcome, PackageSpec } from './types.js'
import { HostprepError } from './errors.js'

/** Append-only record of one run. One entry per package; entries are never revised. */
export class OutcomeLedger {
  private readonly entries: LedgerEntry[] = []
  private readonly errors: string[] = []
  private readonly seen = new Set<string>()

  record(spec: PackageSpec, outcome: PackageOutcome): void {
    if (this.seen.has(spec.name)) {
      throw new HostprepError('LEDGER_DUPLICATE', `Outcome for ${spec.name} already recorded`, { name: spec.name })
    }
    this.seen.add(spec.name)
    this.entries.push(Object.freeze({ spec, outcome }))
    if (outcome.status === 'failed') {
      this.errors.push(outcome.lastError ? `${spec.name}: ${outcome.lastError}` : `${spec.name}: no diagnostic output`)
    }
  }

  addError(text: string): void {
    this.errors.push(text)
  }

  has(name: string): boolean {
    return this.seen.has(name)
  }

  summary(): LedgerSummary {
    const count = (status: PackageOutcome['status']) =>
      this.entries.filter((e) => e.outcome.status === status).length
    return {
      installed: count('installed'),
      skipped: count('skipped'),
      failed: count('failed'),
      total: this.entries.length,
      entries: [...this.entries],
      errors: [...this.errors]
    }
  }
}
