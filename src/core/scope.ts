import { reportError } from './dev.js';

/**
 * A Scope is a lifecycle container.
 * Anything registered via `onCleanup` runs when `dispose()` is called.
 *
 * Every route owns one: layers realized for the route, listeners wired to
 * those layers and effects created while building them are tied to it and
 * released when the route is disposed.
 */
export interface Scope {
  /** Register a cleanup callback to run when the scope is disposed. */
  onCleanup(fn: () => void): void;

  /** Dispose the scope and run all registered cleanups. */
  dispose(): void;

  /** Parent scope in the hierarchy. */
  readonly parent: Scope | null;
}

const disposedScopes = new WeakSet<Scope>();

interface InternalScopeState {
  localCleanups: Array<() => void>;
  childDisposers: Array<() => void>;
}

const scopeState = new WeakMap<Scope, InternalScopeState>();

/** Returns true if the given scope has been disposed. */
export function isScopeDisposed(scope: Scope): boolean {
  return disposedScopes.has(scope);
}

function getInternalScopeState(scope: Scope): InternalScopeState {
  const state = scopeState.get(scope);
  if (!state) {
    throw new Error('[Waypost] Internal scope state missing.');
  }
  return state;
}

function runCleanupSafely(fn: () => void): unknown {
  try {
    fn();
    return undefined;
  } catch (err) {
    return err;
  }
}

/**
 * Creates a new Scope.
 *
 * Notes:
 * - Cleanups on the same scope run in registration order.
 * - Child scopes are disposed before the parent's own cleanups.
 * - Without an explicit parent, the current scope (see `withScope`) is used.
 *   Pass `null` for a detached scope.
 */
export function createScope(parentOverride?: Scope | null): Scope {
  const parentCandidate = parentOverride === undefined ? currentScope : parentOverride;
  // A stale async context can leave `currentScope` pointing at a disposed
  // scope; the new scope is detached in that case.
  const parent = parentCandidate && isScopeDisposed(parentCandidate) ? null : parentCandidate;

  const scope: Scope = {
    onCleanup(fn: () => void) {
      if (isScopeDisposed(scope)) {
        const error = runCleanupSafely(fn);
        if (error) reportError(error, 'scope.onCleanup');
        return;
      }
      getInternalScopeState(scope).localCleanups.push(fn);
    },
    dispose() {
      if (isScopeDisposed(scope)) return;
      disposedScopes.add(scope);

      const state = getInternalScopeState(scope);
      const childSnapshot = state.childDisposers.splice(0);
      const localSnapshot = state.localCleanups.splice(0);

      for (const fn of [...childSnapshot, ...localSnapshot]) {
        const error = runCleanupSafely(fn);
        if (error) reportError(error, 'scope.dispose');
      }
    },
    parent,
  };

  scopeState.set(scope, { localCleanups: [], childDisposers: [] });

  if (parent) {
    getInternalScopeState(parent).childDisposers.push(() => scope.dispose());
  }

  return scope;
}

/**
 * The currently active scope for the running code path.
 * Set by `withScope()` and read by `signal`/`effect`/`computed`.
 */
let currentScope: Scope | null = null;

/** Returns the current active scope (or null if none). */
export function getCurrentScope(): Scope | null {
  return currentScope;
}

/**
 * Runs a function with the given scope set as current, then restores the previous scope.
 */
export function withScope<T>(scope: Scope, fn: () => T): T {
  if (isScopeDisposed(scope)) {
    throw new Error('[Waypost] withScope() cannot enter a disposed scope.');
  }
  const prevScope = currentScope;
  currentScope = scope;
  try {
    return fn();
  } finally {
    currentScope = prevScope;
  }
}
