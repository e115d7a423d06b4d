import type { DebugLogEntry, QueryResult } from '@stixql/validation'

// ── Debug Helpers ──────────────────────────────────────────────

/** Build one log entry for a phase that started at `start` (a `Date.now()` reading). */
export function debugEntry(
  phase: DebugLogEntry['phase'],
  message: string,
  start: number,
  details?: Record<string, unknown> | undefined,
): DebugLogEntry {
  const now = Date.now()
  const durationMs = now - start
  const result: DebugLogEntry = {
    timestamp: now,
    phase,
    message: `${message} (${durationMs.toFixed(1)}ms)`,
    durationMs,
  }
  if (details !== undefined) result.details = details
  return result
}

export function withDebugLog<T>(result: QueryResult<T>, debug: boolean, log: DebugLogEntry[]): QueryResult<T> {
  if (debug && log.length > 0) {
    return { ...result, debugLog: log }
  }
  return result
}
