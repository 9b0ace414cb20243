import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'
import type { QuotaState } from '../../types/quota-state'

import { describeError } from '../errors/describe-error'
import { getQuotaState } from './get-quota-state'
import { sleep } from './sleep'

/**
 * Block until the remaining quota is above the configured threshold.
 *
 * Sleeps until the reported reset time, or for the fallback delay when that
 * time has already passed, then checks again. A failing quota check is
 * logged and the call proceeds. Waiting stops after `maxWaits` waits when a
 * cap is configured.
 *
 * @param context - Client context.
 * @param options - Cancellation; aborts the check and any sleep.
 */
export async function waitForQuota(
  context: GitHubClientContext,
  options: RequestOptions = {},
): Promise<void> {
  let { backoffFactor, fallbackDelay, threshold, maxWaits } = context.quota
  let waits = 0

  for (;;) {
    let quota: QuotaState
    try {
      quota = await getQuotaState(context, options)
    } catch (error) {
      if (options.signal?.aborted) {
        throw error
      }
      context.logger.warn(
        'could not check rate limits, hoping for the best...',
        { error: describeError(error) },
      )
      return
    }

    if (quota.remaining > threshold) {
      return
    }

    if (maxWaits !== undefined && waits >= maxWaits) {
      context.logger.warn('still close to rate limiting, continuing anyway', {
        remaining: quota.remaining,
        waits,
      })
      return
    }

    let delay = quota.resetAt.getTime() - Date.now()
    if (delay <= 0) {
      /* Reset already passed but the counter has not caught up yet. */
      delay = fallbackDelay
      fallbackDelay *= backoffFactor
    }

    waits++
    context.logger.warn(
      'token too close to rate limiting, will sleep before continuing...',
      { sleep: `${Math.ceil(delay / 1000)}s`, remaining: quota.remaining },
    )
    await sleep(delay, options.signal)
  }
}
