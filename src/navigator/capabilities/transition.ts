import { reportError } from '../../core/dev.js';
import type { AnyRoute, RouteCapability } from '../route.js';
import { immediateTransition } from '../transitions.js';

export type TransitionDirection = 'enter' | 'exit';

export type TransitionOutcome = 'completed' | 'canceled';

export interface TransitionRequest {
  readonly route: AnyRoute;
  readonly direction: TransitionDirection;
}

/** A running animation. `done` settles once; a canceled handle settles as `canceled`. */
export interface TransitionHandle {
  readonly done: Promise<TransitionOutcome>;
  cancel(): void;
}

/** Starts the animation of a route entering or leaving. */
export type TransitionDriver = (request: TransitionRequest) => TransitionHandle;

export type TransitionPhase = 'idle' | 'entering' | 'entered' | 'exiting' | 'exited';

export interface TransitionFacet<T> {
  /** Opacity the first entry takes once the entrance completes. */
  readonly opaque: boolean;
  readonly phase: TransitionPhase;
  /** Resolves with the pop result (null if never popped) when the route is disposed. */
  readonly completed: Promise<T | null>;
}

export interface TransitionCapabilityOptions {
  opaque: boolean;
  /** Default: `immediateTransition`. */
  driver?: TransitionDriver;
}

/**
 * Animates a route in on push/replace and out on pop. The first entry stays
 * non-opaque while animating, so the route below remains visible, and the
 * route is finalized only after the exit animation ends.
 */
export function transitionCapability<T>(options: TransitionCapabilityOptions): RouteCapability<T> {
  const driver = options.driver ?? immediateTransition;

  return ({ route, entries }) => {
    let phase: TransitionPhase = 'idle';
    let enter: TransitionHandle | null = null;
    let exit: TransitionHandle | null = null;
    let result: T | null = null;

    let resolveCompleted: (value: T | null) => void = () => {};
    const completed = new Promise<T | null>((resolve) => {
      resolveCompleted = resolve;
    });

    const setFirstOpaque = (opaque: boolean): void => {
      const first = entries[0];
      if (first?.overlay) first.opaque = opaque;
    };

    const startEnter = (): Promise<void> => {
      phase = 'entering';
      setFirstOpaque(false);
      const handle = driver({ route, direction: 'enter' });
      enter = handle;
      return handle.done.then(
        (outcome) => {
          if (enter !== handle) return;
          enter = null;
          if (outcome === 'completed') {
            phase = 'entered';
            setFirstOpaque(options.opaque);
          }
        },
        (error: unknown) => {
          if (enter === handle) enter = null;
          reportError(error, 'transition.enter');
        }
      );
    };

    const startExit = (): void => {
      phase = 'exiting';
      setFirstOpaque(false);
      const handle = driver({ route, direction: 'exit' });
      exit = handle;
      // Canceled or not, an inactive route is finished once its exit ends.
      void handle.done
        .then(() => {
          if (exit !== handle) return;
          exit = null;
          phase = 'exited';
          const navigator = route.navigator;
          if (navigator && !route.isActive) navigator.finalizeRoute(route);
        })
        .catch((error: unknown) => reportError(error, 'transition.exit'));
    };

    return {
      facets: {
        transition: {
          opaque: options.opaque,
          get phase() {
            return phase;
          },
          completed,
        },
      },
      didPush(next) {
        return Promise.all([next(), startEnter()]).then(() => undefined);
      },
      didReplace(next, oldRoute) {
        next(oldRoute);
        void startEnter();
      },
      didPop(next, popResult) {
        result = popResult;
        if (enter) {
          const handle = enter;
          enter = null;
          handle.cancel();
        }
        const proceed = next(popResult);
        if (proceed) startExit();
        return proceed;
      },
      dispose(next) {
        const running = [enter, exit];
        enter = null;
        exit = null;
        for (const handle of running) handle?.cancel();
        phase = 'exited';
        next();
        resolveCompleted(result);
      },
    };
  };
}
