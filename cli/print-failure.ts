import pc from 'picocolors'

import { NoMilestoneFoundError } from '../core/errors/no-milestone-found-error'
import { describeError } from '../core/errors/describe-error'
import { isRetriable } from '../core/errors/retriable-error'

/**
 * Prints a failed command's error, including its cause chain.
 *
 * @param error - Thrown value.
 */
export function printFailure(error: unknown): void {
  if (error instanceof NoMilestoneFoundError) {
    console.error(pc.yellow(`\n⚠️  No milestone titled "${error.title}"\n`))
    return
  }

  console.error(pc.redBright('\nError:'), describeError(error))
  if (isRetriable(error)) {
    console.error(pc.gray('\nThe failure looks temporary, try again.\n'))
  }
}
