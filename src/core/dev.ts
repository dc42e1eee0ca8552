let isDevMode = true;

export function setDevMode(enabled: boolean): void {
  isDevMode = enabled;
}

export function isInDevMode(): boolean {
  return isDevMode;
}

/**
 * Optional global handler for errors the engine isolates instead of
 * propagating: observer callbacks, deferred teardown, transition drivers and
 * scope cleanups. Without a handler they are logged to the console.
 *
 * @example
 * setErrorHandler((err, source) => report(err, { source }));
 */
let errorHandler: ((error: Error, source: string) => void) | null = null;

export function setErrorHandler(handler: ((error: Error, source: string) => void) | null): void {
  errorHandler = handler;
}

/** Normalizes unknown throws and routes them to the global handler (or console). */
export function reportError(error: unknown, source: string): void {
  const err = error instanceof Error ? error : new Error(String(error));
  if (errorHandler) errorHandler(err, source);
  else console.error(`[Waypost] Error in ${source}:`, err);
}

/** Dev-only warning for recoverable misconfiguration. */
export function warn(message: string): void {
  if (!isDevMode) return;
  console.warn(`[Waypost] ${message}`);
}

/**
 * Throws a precondition error when `condition` is false.
 * `operation` names the public call that was misused, e.g. `push()`.
 */
export function assertPrecondition(condition: boolean, operation: string, message: string): asserts condition {
  if (!condition) {
    throw new Error(`[Waypost] ${operation} ${message}`);
  }
}
