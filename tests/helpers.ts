import { createOverlayEntry } from '../src/overlay/overlay.js';
import { createOverlayRoute } from '../src/navigator/routes.js';
import type { AnyRoute, Route, RouteCapability } from '../src/navigator/route.js';
import type {
  TransitionDirection,
  TransitionDriver,
  TransitionHandle,
  TransitionOutcome,
} from '../src/navigator/capabilities/transition.js';

export const tick = (ms = 0) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export const nameOf = (route: AnyRoute | null) => route?.settings.name ?? 'null';

export const namesOf = (routes: readonly AnyRoute[]) => routes.map(nameOf);

/** Records neighbor notifications as `A.didChangeNext(B)` lines. */
export function neighborLog<T>(log: string[]): RouteCapability<T> {
  return ({ route }) => ({
    didChangeNext(next, nextRoute) {
      log.push(`${nameOf(route)}.didChangeNext(${nameOf(nextRoute)})`);
      next(nextRoute);
    },
    didChangePrevious(next, previousRoute) {
      log.push(`${nameOf(route)}.didChangePrevious(${nameOf(previousRoute)})`);
      next(previousRoute);
    },
    didPopNext(next, nextRoute) {
      log.push(`${nameOf(route)}.didPopNext(${nameOf(nextRoute)})`);
      next(nextRoute);
    },
  });
}

interface PageOptions<T> {
  log?: string[];
  isInitialRoute?: boolean;
  localHistory?: boolean;
  currentResult?: () => T | null;
  capabilities?: RouteCapability<T>[];
}

/** Overlay route with one opaque entry whose layer is the route name. */
export function page<T = unknown>(name: string, options: PageOptions<T> = {}): Route<T> {
  const capabilities = [...(options.capabilities ?? [])];
  if (options.log) capabilities.push(neighborLog<T>(options.log));
  return createOverlayRoute<T>({
    settings: { name, isInitialRoute: options.isInitialRoute },
    localHistory: options.localHistory,
    currentResult: options.currentResult,
    capabilities,
    buildEntries: () => [createOverlayEntry(() => name, { label: name })],
  });
}

export interface PendingTransition {
  readonly route: AnyRoute;
  readonly direction: TransitionDirection;
  readonly handle: TransitionHandle;
  canceled: boolean;
  complete(): void;
}

/** Transition driver that only finishes when the test says so. */
export function createManualTransition() {
  const started: PendingTransition[] = [];

  const driver: TransitionDriver = ({ route, direction }) => {
    let settle: (outcome: TransitionOutcome) => void = () => {};
    const done = new Promise<TransitionOutcome>((resolve) => {
      settle = resolve;
    });
    const handle: TransitionHandle = {
      done,
      cancel() {
        pending.canceled = true;
        settle('canceled');
      },
    };
    const pending: PendingTransition = {
      route,
      direction,
      handle,
      canceled: false,
      complete: () => settle('completed'),
    };
    started.push(pending);
    return handle;
  };

  const last = (direction: TransitionDirection): PendingTransition => {
    const match = [...started].reverse().find((transition) => transition.direction === direction);
    if (!match) throw new Error(`No ${direction} transition was started.`);
    return match;
  };

  return { driver, started, last };
}
