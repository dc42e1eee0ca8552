import { createOverlayEntry, type LayerContext, type LayerFactory, type OverlayEntry } from '../overlay/overlay.js';
import { createRoute, type Route, type RouteCapability, type RouteOptions, type RoutePredicate } from './route.js';
import { localHistoryCapability } from './capabilities/local-history.js';
import { modalCapability } from './capabilities/modal.js';
import { overlayCapability } from './capabilities/overlay.js';
import { transitionCapability } from './capabilities/transition.js';
import type { TransitionDriver } from './capabilities/transition.js';

export interface OverlayRouteOptions<T> extends RouteOptions<T> {
  buildEntries(route: Route<T>): OverlayEntry[];
  /** Default: true. */
  finishedWhenPopped?: boolean;
  /** Adds a local history stack (`route.localHistory`). Default: false. */
  localHistory?: boolean;
}

/** A route whose entries live in the navigator's overlay; finalized as soon as it is popped. */
export function createOverlayRoute<T = unknown>(options: OverlayRouteOptions<T>): Route<T> {
  const builtIns: RouteCapability<T>[] = [];
  if (options.localHistory) builtIns.push(localHistoryCapability<T>());
  builtIns.push(
    overlayCapability<T>({
      buildEntries: options.buildEntries,
      finishedWhenPopped: options.finishedWhenPopped ?? true,
    })
  );
  return createRoute<T>({ ...options, capabilities: [...(options.capabilities ?? []), ...builtIns] });
}

export interface TransitionRouteOptions<T> extends RouteOptions<T> {
  buildEntries(route: Route<T>): OverlayEntry[];
  /** Opacity of the first entry once the entrance completes. */
  opaque: boolean;
  /** Default: `immediateTransition`. */
  transition?: TransitionDriver;
  /** Adds a local history stack (`route.localHistory`). Default: false. */
  localHistory?: boolean;
}

/** An overlay route that animates in and out. */
export function createTransitionRoute<T = unknown>(options: TransitionRouteOptions<T>): Route<T> {
  const builtIns: RouteCapability<T>[] = [];
  if (options.localHistory) builtIns.push(localHistoryCapability<T>());
  builtIns.push(
    transitionCapability<T>({ opaque: options.opaque, driver: options.transition }),
    overlayCapability<T>({ buildEntries: options.buildEntries, finishedWhenPopped: false })
  );
  return createRoute<T>({ ...options, capabilities: [...(options.capabilities ?? []), ...builtIns] });
}

/** Builds the barrier layer. `dismiss` pops the route when the barrier is dismissible. */
export type BarrierFactory = (context: LayerContext, dismiss: () => boolean) => unknown;

export interface ModalRouteOptions<T> extends RouteOptions<T> {
  buildPage: LayerFactory;
  /** Without a barrier factory the route has a single entry. */
  buildBarrier?: BarrierFactory;
  opaque: boolean;
  barrierDismissible: boolean;
  transition?: TransitionDriver;
}

/**
 * A transition route with a modal barrier below its page. Every modal route
 * carries a local history stack.
 */
export function createModalRoute<T = unknown>(options: ModalRouteOptions<T>): Route<T> {
  const { buildPage, buildBarrier } = options;

  const buildEntries = (route: Route<T>): OverlayEntry[] => {
    const page = createOverlayEntry(buildPage, { opaque: false, label: 'page' });
    if (!buildBarrier) return [page];
    const dismiss = () => route.modal?.dismiss() ?? false;
    const barrier = createOverlayEntry((context) => buildBarrier(context, dismiss), { opaque: false, label: 'barrier' });
    return [barrier, page];
  };

  return createRoute<T>({
    ...options,
    capabilities: [
      ...(options.capabilities ?? []),
      modalCapability<T>({ barrierDismissible: options.barrierDismissible }),
      localHistoryCapability<T>(),
      transitionCapability<T>({ opaque: options.opaque, driver: options.transition }),
      overlayCapability<T>({ buildEntries, finishedWhenPopped: false }),
    ],
  });
}

export type PageRouteOptions<T> = Omit<ModalRouteOptions<T>, 'opaque' | 'barrierDismissible'>;

/** Full-screen modal route: opaque, and the barrier never dismisses it. */
export function createPageRoute<T = unknown>(options: PageRouteOptions<T>): Route<T> {
  return createModalRoute<T>({ ...options, opaque: true, barrierDismissible: false });
}

export interface PopupRouteOptions<T> extends Omit<ModalRouteOptions<T>, 'opaque' | 'barrierDismissible'> {
  /** Default: true. */
  barrierDismissible?: boolean;
}

/** Modal route drawn over the previous one: non-opaque and dismissible by default. */
export function createPopupRoute<T = unknown>(options: PopupRouteOptions<T>): Route<T> {
  return createModalRoute<T>({ ...options, opaque: false, barrierDismissible: options.barrierDismissible ?? true });
}

/** Matches routes by `settings.name`, e.g. `navigator.popUntil(routeWithName('/'))`. */
export function routeWithName(name: string): RoutePredicate {
  return (route) => route !== null && route.settings.name === name;
}
