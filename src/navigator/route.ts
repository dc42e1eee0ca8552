import { createScope, type Scope } from '../core/scope.js';
import { assertPrecondition } from '../core/dev.js';
import type { OverlayEntry } from '../overlay/overlay.js';
import type { Navigator } from './navigator.js';
import type { LocalHistory } from './capabilities/local-history.js';
import type { TransitionFacet } from './capabilities/transition.js';
import type { ModalFacet } from './capabilities/modal.js';

/**
 * Answer of `Route.willPop()`.
 *
 * - `pop`: proceed with the pop.
 * - `doNotPop`: veto silently; the back request is absorbed.
 * - `bubble`: let the outer system handle it (usually: leave the application).
 */
export type PopDisposition = 'pop' | 'doNotPop' | 'bubble';

export interface RouteSettings {
  /** Route name (e.g. "/settings"); null for anonymous routes. */
  readonly name: string | null;
  /** True when the route is resolved while the navigator history is still empty. */
  readonly isInitialRoute: boolean;
}

export type AnyRoute = Route<unknown>;

export type RoutePredicate = (route: AnyRoute | null) => boolean;

/** Host-supplied factory behind `onGenerateRoute` / `onUnknownRoute`. */
export type RouteFactory = (settings: RouteSettings) => AnyRoute | null;

/**
 * Lifecycle calls the navigator makes on a route. Routes never call these on
 * other routes; neighbor notifications always go through the navigator.
 */
export interface RouteLifecycle<T> {
  /** Called once, before the route is part of the stack. */
  install(insertionPoint: OverlayEntry | null): void;
  /** Resolves when the entrance transition is over. Completion signal only. */
  didPush(): Promise<void>;
  didReplace(oldRoute: AnyRoute | null): void;
  willPop(): Promise<PopDisposition>;
  /** Returns false when the pop was handled inside the route. */
  didPop(result: T | null): boolean;
  didPopNext(nextRoute: AnyRoute): void;
  didChangeNext(nextRoute: AnyRoute | null): void;
  didChangePrevious(previousRoute: AnyRoute | null): void;
  /** Resolves `popped`. May only happen once. */
  didComplete(result: T | null): void;
  /** The answers of `willHandlePopInternally` / `didPop` may have changed. */
  changedInternalState(): void;
  /** Releases entries and the navigator back-reference. May only happen once. */
  dispose(): void;
}

export interface Route<T = unknown> extends RouteLifecycle<T> {
  readonly navigator: Navigator | null;
  /** Overlay entries owned by this route, bottom to top. */
  readonly entries: readonly OverlayEntry[];
  readonly popped: Promise<T | null>;
  /** Used by `pop()` when no result is given. */
  readonly currentResult: T | null;
  readonly settings: RouteSettings;
  readonly scope: Scope;
  readonly willHandlePopInternally: boolean;
  /** Topmost route of its navigator. */
  readonly isCurrent: boolean;
  /** Bottommost route of its navigator. */
  readonly isFirst: boolean;
  /** Present in its navigator's history. */
  readonly isActive: boolean;
  readonly disposed: boolean;
  readonly localHistory: LocalHistory | null;
  readonly transition: TransitionFacet<T> | null;
  readonly modal: ModalFacet | null;
}

/**
 * Capability hooks wrap the lifecycle method of the same name. Each receives
 * `next`, the behavior of the capabilities below it (ending in the base
 * route), and decides whether and when to delegate.
 */
export interface RouteCapabilityHooks<T> {
  install?(next: (insertionPoint: OverlayEntry | null) => void, insertionPoint: OverlayEntry | null): void;
  didPush?(next: () => Promise<void>): Promise<void>;
  didReplace?(next: (oldRoute: AnyRoute | null) => void, oldRoute: AnyRoute | null): void;
  willPop?(next: () => Promise<PopDisposition>): Promise<PopDisposition>;
  didPop?(next: (result: T | null) => boolean, result: T | null): boolean;
  didPopNext?(next: (nextRoute: AnyRoute) => void, nextRoute: AnyRoute): void;
  didChangeNext?(next: (nextRoute: AnyRoute | null) => void, nextRoute: AnyRoute | null): void;
  didChangePrevious?(next: (previousRoute: AnyRoute | null) => void, previousRoute: AnyRoute | null): void;
  didComplete?(next: (result: T | null) => void, result: T | null): void;
  changedInternalState?(next: () => void): void;
  dispose?(next: () => void): void;
  willHandlePopInternally?(next: () => boolean): boolean;
}

export interface RouteFacets<T> {
  localHistory: LocalHistory;
  transition: TransitionFacet<T>;
  modal: ModalFacet;
}

export interface RouteCapabilityInstance<T> extends RouteCapabilityHooks<T> {
  readonly facets?: Partial<RouteFacets<T>>;
}

export interface RouteCapabilityContext<T> {
  readonly route: Route<T>;
  /** The route's own entry list; capabilities that realize layers fill and clear it. */
  readonly entries: OverlayEntry[];
}

export type RouteCapability<T> = (context: RouteCapabilityContext<T>) => RouteCapabilityInstance<T>;

export interface RouteOptions<T> {
  settings?: Partial<RouteSettings>;
  currentResult?: () => T | null;
  /**
   * Extra capabilities, most specific first. They run before the built-in
   * capabilities of the route factory.
   */
  capabilities?: ReadonlyArray<RouteCapability<T>>;
}

interface RouteState {
  navigator: Navigator | null;
  disposed: boolean;
  completed: boolean;
}

const routeStates = new WeakMap<AnyRoute, RouteState>();

function getRouteState(route: AnyRoute, operation: string): RouteState {
  const state = routeStates.get(route);
  assertPrecondition(state !== undefined, operation, 'expects a route created with createRoute().');
  return state;
}

/** Navigator-only: sets or clears the back-reference of a route. */
export function bindRouteNavigator(route: AnyRoute, navigator: Navigator | null): void {
  getRouteState(route, 'Navigator').navigator = navigator;
}

type Link<A extends unknown[], R> = ((next: (...args: A) => R, ...args: A) => R) | undefined;

/** Folds capability hooks into one function, first hook outermost. */
function compose<A extends unknown[], R>(links: ReadonlyArray<Link<A, R>>, base: (...args: A) => R): (...args: A) => R {
  return links.reduceRight<(...args: A) => R>((next, link) => {
    if (!link) return next;
    const step = link;
    return (...args: A) => step(next, ...args);
  }, base);
}

/**
 * Creates a route with no visual presence of its own. Overlay, local-history,
 * transition and modal behavior come from capabilities; see
 * `createOverlayRoute`, `createTransitionRoute` and `createModalRoute`.
 */
export function createRoute<T = unknown>(options: RouteOptions<T> = {}): Route<T> {
  const state: RouteState = { navigator: null, disposed: false, completed: false };
  const entries: OverlayEntry[] = [];
  const scope = createScope(null);
  const settings: RouteSettings = {
    name: options.settings?.name ?? null,
    isInitialRoute: options.settings?.isInitialRoute ?? false,
  };

  let resolvePopped: (value: T | null) => void = () => {};
  const popped = new Promise<T | null>((resolve) => {
    resolvePopped = resolve;
  });

  const historyOf = (): readonly AnyRoute[] => state.navigator?.history ?? [];

  const base: RouteLifecycle<T> & { willHandlePopInternally(): boolean } = {
    install() {},
    didPush: () => Promise.resolve(),
    didReplace() {},
    willPop: () => Promise.resolve(route.isFirst ? 'bubble' : 'pop'),
    didPop(result) {
      route.didComplete(result);
      return true;
    },
    didPopNext() {},
    didChangeNext() {},
    didChangePrevious() {},
    didComplete(result) {
      state.completed = true;
      resolvePopped(result);
    },
    changedInternalState() {},
    dispose() {
      state.disposed = true;
      state.navigator = null;
      scope.dispose();
    },
    willHandlePopInternally: () => false,
  };

  let chain = base;
  let facets: Partial<RouteFacets<T>> = {};

  const route: Route<T> = {
    get navigator() {
      return state.navigator;
    },
    entries,
    popped,
    get currentResult() {
      return options.currentResult ? options.currentResult() : null;
    },
    settings,
    scope,
    get willHandlePopInternally() {
      return chain.willHandlePopInternally();
    },
    get isCurrent() {
      const history = historyOf();
      return history.length > 0 && history[history.length - 1] === route;
    },
    get isFirst() {
      const history = historyOf();
      return history.length > 0 && history[0] === route;
    },
    get isActive() {
      return historyOf().includes(route);
    },
    get disposed() {
      return state.disposed;
    },
    get localHistory() {
      return facets.localHistory ?? null;
    },
    get transition() {
      return facets.transition ?? null;
    },
    get modal() {
      return facets.modal ?? null;
    },
    install: (insertionPoint) => chain.install(insertionPoint),
    didPush: () => chain.didPush(),
    didReplace: (oldRoute) => chain.didReplace(oldRoute),
    willPop: () => chain.willPop(),
    didPop: (result) => chain.didPop(result),
    didPopNext: (nextRoute) => chain.didPopNext(nextRoute),
    didChangeNext: (nextRoute) => chain.didChangeNext(nextRoute),
    didChangePrevious: (previousRoute) => chain.didChangePrevious(previousRoute),
    didComplete(result) {
      assertPrecondition(!state.completed, 'Route.didComplete()', 'called on a route that already completed.');
      chain.didComplete(result);
    },
    changedInternalState: () => chain.changedInternalState(),
    dispose() {
      assertPrecondition(!state.disposed, 'Route.dispose()', 'called on a route that is already disposed.');
      chain.dispose();
    },
  };

  routeStates.set(route, state);

  const instances = (options.capabilities ?? []).map((capability) => capability({ route, entries }));
  for (const instance of [...instances].reverse()) {
    facets = { ...facets, ...instance.facets };
  }

  chain = {
    install: compose(instances.map((c) => c.install), base.install),
    didPush: compose(instances.map((c) => c.didPush), base.didPush),
    didReplace: compose(instances.map((c) => c.didReplace), base.didReplace),
    willPop: compose(instances.map((c) => c.willPop), base.willPop),
    didPop: compose(instances.map((c) => c.didPop), base.didPop),
    didPopNext: compose(instances.map((c) => c.didPopNext), base.didPopNext),
    didChangeNext: compose(instances.map((c) => c.didChangeNext), base.didChangeNext),
    didChangePrevious: compose(instances.map((c) => c.didChangePrevious), base.didChangePrevious),
    didComplete: compose(instances.map((c) => c.didComplete), base.didComplete),
    changedInternalState: compose(instances.map((c) => c.changedInternalState), base.changedInternalState),
    dispose: compose(instances.map((c) => c.dispose), base.dispose),
    willHandlePopInternally: compose(instances.map((c) => c.willHandlePopInternally), base.willHandlePopInternally),
  };

  return route;
}
