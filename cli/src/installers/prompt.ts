import * as p from '@clack/prompts'

export type YesNo = 'yes' | 'no'

export function parseYesNo(input: string | undefined): YesNo | undefined {
  const normalized = (input ?? '').trim().toLowerCase()
  if (normalized === 'y' || normalized === 'yes') return 'yes'
  if (normalized === 'n' || normalized === 'no') return 'no'
  return undefined
}

export interface ConfirmOptions {
  assumeYes: boolean
  interactive: boolean
}

/**
 * Yes/no collaborator for optional steps. Re-asks until the answer is one of
 * y/yes/n/no; a cancelled prompt counts as "no".
 */
export function createConfirm(opts: ConfirmOptions): (question: string) => Promise<boolean> {
  return async (question) => {
    if (opts.assumeYes) return true
    if (!opts.interactive) return false
    const answer = await p.text({
      message: `${question} (yes/y or no/n)`,
      validate(value) {
        if (!parseYesNo(value)) return 'Please answer yes (y/Y) or no (n/N)'
        return undefined
      }
    })
    if (p.isCancel(answer)) return false
    return parseYesNo(answer) === 'yes'
  }
}
