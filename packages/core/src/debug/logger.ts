import type { DebugLogEntry } from '@dbjob/validation'
import type { Logger } from 'pino'
import { pino } from 'pino'

export type { Logger }

/**
 * Library-wide logger. Silent unless `DBJOB_LOG_LEVEL` is set, so embedding
 * applications opt in (or pass their own logger to `createDbConnector`).
 */
export const logger: Logger = pino({
  name: 'dbjob',
  level: process.env.DBJOB_LOG_LEVEL ?? 'silent',
  formatters: {
    level: (label: string) => ({ level: label }),
  },
})

export function createModuleLogger(moduleName: string, parent: Logger = logger): Logger {
  return parent.child({ module: moduleName })
}

export function logError(log: Logger, err: unknown, message: string, context: Record<string, unknown> = {}): void {
  if (err instanceof Error) {
    log.error({ ...context, err }, message)
  } else {
    log.error({ ...context, err: String(err) }, message)
  }
}

// ── Debug entries ──────────────────────────────────────────────

export function entry(
  phase: DebugLogEntry['phase'],
  message: string,
  durationMs: number,
  details?: unknown,
): DebugLogEntry {
  const result: DebugLogEntry = {
    timestamp: Date.now(),
    phase,
    message: `${message} (${durationMs.toFixed(1)}ms)`,
  }
  if (details !== undefined) result.details = details
  return result
}
