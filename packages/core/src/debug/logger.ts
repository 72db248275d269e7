import type { DebugLogEntry, QueryResult } from '@emp-dept/validation'

export function debugEntry(
  phase: DebugLogEntry['phase'],
  message: string,
  durationMs: number,
  details?: unknown,
): DebugLogEntry {
  return {
    timestamp: Date.now(),
    phase,
    message: `${message} (${durationMs.toFixed(1)}ms)`,
    ...(details !== undefined ? { details } : {}),
  }
}

/** Attaches `debugLog` only when debugging is on and something was logged. */
export function withDebugLog<T>(result: QueryResult<T>, debug: boolean, log: readonly DebugLogEntry[]): QueryResult<T> {
  if (debug && log.length > 0) {
    return { ...result, debugLog: log }
  }
  return result
}
