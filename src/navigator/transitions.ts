import type { TransitionDriver, TransitionOutcome } from './capabilities/transition.js';

/** Finishes every transition on the next microtask. */
export const immediateTransition: TransitionDriver = () => {
  let outcome: TransitionOutcome = 'completed';
  return {
    done: Promise.resolve().then(() => outcome),
    cancel() {
      outcome = 'canceled';
    },
  };
};

/**
 * Finishes transitions after `durationMs`. `cancel()` settles the handle
 * right away as `canceled`.
 */
export function createTimedTransition(durationMs: number): TransitionDriver {
  if (!Number.isFinite(durationMs) || durationMs < 0) {
    throw new Error(`[Waypost] createTimedTransition() expects a non-negative duration, got ${durationMs}.`);
  }

  return () => {
    let settle: (outcome: TransitionOutcome) => void = () => {};
    const done = new Promise<TransitionOutcome>((resolve) => {
      settle = resolve;
    });
    const timer = setTimeout(() => settle('completed'), durationMs);
    return {
      done,
      cancel() {
        clearTimeout(timer);
        settle('canceled');
      },
    };
  };
}
