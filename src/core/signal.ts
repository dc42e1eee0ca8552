import { getCurrentScope, type Scope, withScope } from './scope.js';
import { scheduleMicrotask, isBatching, queueInBatch } from './scheduler.js';
import { reportError } from './dev.js';

type EffectFn = (() => void) & {
  /** Subscriber sets this effect is registered in, for unsubscribe on re-run and dispose. */
  deps?: Set<Set<EffectFn>>;

  /** When true, this effect must never execute again. */
  disposed?: boolean;

  /** Computed invalidation runs synchronously. */
  sync?: boolean;
};

/** Currently executing effect (dependency collector). */
let activeEffect: EffectFn | null = null;

/** Scope of the currently executing effect; reads from other scopes do not subscribe. */
let activeScope: Scope | null = null;

/** Dedup set: several writes in the same tick enqueue an effect once. */
const pendingEffects = new Set<EffectFn>();

/** Stable runner per effect, so batch dedupe by identity works. */
const effectRunners = new WeakMap<EffectFn, () => void>();

function scheduleEffect(eff: EffectFn): void {
  if (eff.disposed) return;

  if (eff.sync) {
    try {
      eff();
    } catch (error) {
      reportError(error, 'computed');
    }
    return;
  }

  if (pendingEffects.has(eff)) return;
  pendingEffects.add(eff);

  let runEffect = effectRunners.get(eff);
  if (!runEffect) {
    runEffect = () => {
      pendingEffects.delete(eff);
      if (eff.disposed) return;

      try {
        eff();
      } catch (error) {
        reportError(error, 'effect');
      }
    };
    effectRunners.set(eff, runEffect);
  }

  if (isBatching()) queueInBatch(runEffect);
  else scheduleMicrotask(runEffect);
}

function track(subscribers: Set<EffectFn>): void {
  if (!activeEffect || activeEffect.disposed) return;
  if (activeScope && activeScope !== getCurrentScope()) return;
  if (subscribers.has(activeEffect)) return;
  subscribers.add(activeEffect);
  (activeEffect.deps ??= new Set()).add(subscribers);
}

export interface Signal<T> {
  (): T;
  set(value: T): void;
  update(fn: (v: T) => T): void;
}

/** Read side of a signal. Reading it inside an effect still subscribes. */
export type ReadonlySignal<T> = () => T;

/** Exposes `source` without its setters. */
export function readonlySignal<T>(source: Signal<T>): ReadonlySignal<T> {
  return () => source();
}

/**
 * Creates a signal: a mutable value with automatic dependency tracking.
 *
 * Reads inside effects subscribe the effect; writes notify subscribers,
 * deferred into the batch queue while inside `batch()`.
 */
export function signal<T>(initialValue: T): Signal<T> {
  let value = initialValue;
  const subscribers = new Set<EffectFn>();
  const owningScope = getCurrentScope();

  const read = () => {
    track(subscribers);
    return value;
  };

  const notify = () => {
    for (const eff of subscribers) scheduleEffect(eff);
  };

  read.set = (nextValue: T) => {
    if (Object.is(value, nextValue)) return;
    value = nextValue;
    if (isBatching()) queueInBatch(notify);
    else notify();
  };

  read.update = (fn: (v: T) => T) => {
    read.set(fn(value));
  };

  if (owningScope) {
    owningScope.onCleanup(() => {
      subscribers.clear();
    });
  }

  return read;
}

/**
 * Creates an effect: reruns `fn` whenever a tracked signal changes.
 *
 * The first run is scheduled (microtask). Dependencies are re-collected on
 * every run. Inside a scope, the effect is disposed with the scope.
 */
export function effect(fn: () => void): () => void {
  const owningScope = getCurrentScope();

  const cleanupDeps = () => {
    if (!run.deps) return;
    for (const depSet of run.deps) depSet.delete(run);
    run.deps.clear();
  };

  const dispose = () => {
    if (run.disposed) return;
    run.disposed = true;
    cleanupDeps();
    pendingEffects.delete(run);
  };

  const run: EffectFn = () => {
    if (run.disposed) return;
    cleanupDeps();

    const prevEffect = activeEffect;
    const prevScope = activeScope;

    activeEffect = run;
    activeScope = owningScope;

    try {
      if (owningScope) withScope(owningScope, fn);
      else fn();
    } finally {
      activeEffect = prevEffect;
      activeScope = prevScope;
    }
  };

  scheduleEffect(run);
  if (owningScope) owningScope.onCleanup(dispose);

  return dispose;
}

/**
 * Creates a computed signal.
 *
 * Lazy and cached: recomputes on the first read after a dependency changed.
 * Invalidation is synchronous, so a read right after a write sees the new value.
 * Computed signals are read-only.
 */
export function computed<T>(fn: () => T): Signal<T> {
  let cache: { value: T } | null = null;
  let dirty = true;

  const subscribers = new Set<EffectFn>();
  const owningScope = getCurrentScope();
  let trackedDeps = new Set<Set<EffectFn>>();

  const markDirty: EffectFn = () => {
    if (dirty) return;
    dirty = true;
    for (const eff of subscribers) scheduleEffect(eff);
  };
  markDirty.sync = true;

  const cleanupDeps = () => {
    for (const depSet of trackedDeps) depSet.delete(markDirty);
    trackedDeps.clear();
    markDirty.deps?.clear();
  };

  const recompute = (): T => {
    cleanupDeps();

    const prevEffect = activeEffect;
    const prevScope = activeScope;
    activeEffect = markDirty;
    // Computed dependencies are tracked regardless of the reader's scope.
    activeScope = null;

    try {
      const next = fn();
      cache = { value: next };
      dirty = false;
      if (markDirty.deps) trackedDeps = new Set(markDirty.deps);
      return next;
    } finally {
      activeEffect = prevEffect;
      activeScope = prevScope;
    }
  };

  const read = (): T => {
    track(subscribers);
    if (dirty || !cache) return recompute();
    return cache.value;
  };

  read.set = () => {
    throw new Error('[Waypost] Cannot set a computed signal directly.');
  };

  read.update = () => {
    throw new Error('[Waypost] Cannot update a computed signal directly.');
  };

  if (owningScope) {
    owningScope.onCleanup(() => {
      markDirty.disposed = true;
      cleanupDeps();
      subscribers.clear();
    });
  }

  return read;
}
