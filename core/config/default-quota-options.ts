import type { QuotaOptions } from '../../types/quota-options'

export const defaultQuotaOptions: QuotaOptions = {
  fallbackDelay: 15_000,
  maxWaits: undefined,
  backoffFactor: 1,
  threshold: 100,
}
