// ── Debug Log ──────────────────────────────────────────────────

export type DebugPhase = 'execution' | 'rewind' | 'metadata' | 'materialization' | 'release'

export interface DebugLogEntry {
  readonly timestamp: number
  readonly phase: DebugPhase
  readonly message: string
  readonly durationMs: number
  readonly details?: unknown
}

export function debugEntry(phase: DebugPhase, message: string, durationMs: number, details?: unknown): DebugLogEntry {
  const result: DebugLogEntry = {
    timestamp: Date.now(),
    phase,
    message,
    durationMs,
  }
  if (details !== undefined) {
    return { ...result, details }
  }
  return result
}

/**
 * Run `fn`, and when `debug` is on append an entry for it to `log`.
 * `describe` builds the message from the function's result.
 */
export function withDebugLog<T>(
  debug: boolean,
  log: DebugLogEntry[],
  phase: DebugPhase,
  describe: (result: T) => string,
  fn: () => T,
): T {
  if (!debug) return fn()
  const t0 = Date.now()
  const result = fn()
  log.push(debugEntry(phase, describe(result), Date.now() - t0))
  return result
}
