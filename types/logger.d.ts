/** Structured key-value context attached to a log line. */
export type LogFields = Record<
  string,
  undefined | boolean | string | number | null
>

/** Log sink used by every operation. */
export interface Logger {
  debug(message: string, fields?: LogFields): void
  error(message: string, fields?: LogFields): void
  info(message: string, fields?: LogFields): void
  warn(message: string, fields?: LogFields): void
}
