import { assertPrecondition } from '../../core/dev.js';
import type { AnyRoute, RouteCapability } from '../route.js';

/**
 * A "back step" inside a route (an open drawer, a search field, an inline
 * edit mode) that is consumed by back before the route itself pops.
 */
export interface LocalHistoryEntry {
  /** Route the entry is registered with, or null while detached. */
  readonly owner: AnyRoute | null;
  /** Detaches the entry from its owner. No-op while detached. */
  remove(): void;
}

export interface LocalHistory {
  readonly size: number;
  /** Registered entries, oldest first. */
  readonly entries: readonly LocalHistoryEntry[];
  add(entry: LocalHistoryEntry): void;
  remove(entry: LocalHistoryEntry): void;
}

interface EntryState {
  owner: AnyRoute | null;
  onRemove: (() => void) | undefined;
}

const entryStates = new WeakMap<LocalHistoryEntry, EntryState>();

function stateOf(entry: LocalHistoryEntry, operation: string): EntryState {
  const state = entryStates.get(entry);
  assertPrecondition(state !== undefined, operation, 'expects an entry created with createLocalHistoryEntry().');
  return state;
}

/** `onRemove` runs when the entry leaves its owner, by pop or by `remove()`. */
export function createLocalHistoryEntry(onRemove?: () => void): LocalHistoryEntry {
  const entry: LocalHistoryEntry = {
    get owner() {
      return stateOf(entry, 'LocalHistoryEntry.owner').owner;
    },
    remove() {
      const owner = stateOf(entry, 'LocalHistoryEntry.remove()').owner;
      owner?.localHistory?.remove(entry);
    },
  };
  entryStates.set(entry, { owner: null, onRemove });
  return entry;
}

/**
 * Adds a local history stack to a route. While it is non-empty the route
 * answers `pop` to `willPop()` and consumes pops itself, newest entry first.
 */
export function localHistoryCapability<T>(): RouteCapability<T> {
  return ({ route }) => {
    const entries: LocalHistoryEntry[] = [];

    const detach = (entry: LocalHistoryEntry): void => {
      const state = stateOf(entry, 'LocalHistory');
      state.owner = null;
      state.onRemove?.();
    };

    const history: LocalHistory = {
      get size() {
        return entries.length;
      },
      get entries() {
        return [...entries];
      },
      add(entry) {
        const state = stateOf(entry, 'LocalHistory.add()');
        assertPrecondition(state.owner === null, 'LocalHistory.add()', 'called with an entry that already has an owner.');
        state.owner = route;
        entries.push(entry);
        if (entries.length === 1) route.changedInternalState();
      },
      remove(entry) {
        const index = entries.indexOf(entry);
        assertPrecondition(index !== -1, 'LocalHistory.remove()', 'called with an entry of another route.');
        entries.splice(index, 1);
        detach(entry);
        if (entries.length === 0) route.changedInternalState();
      },
    };

    return {
      facets: { localHistory: history },
      willPop(next) {
        if (entries.length > 0) return Promise.resolve('pop');
        return next();
      },
      didPop(next, result) {
        const entry = entries.pop();
        if (!entry) return next(result);
        detach(entry);
        if (entries.length === 0) route.changedInternalState();
        return false;
      },
      willHandlePopInternally(next) {
        return entries.length > 0 || next();
      },
    };
  };
}
