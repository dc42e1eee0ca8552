import { assertPrecondition, reportError, warn } from '../core/dev.js';
import { batch } from '../core/scheduler.js';
import { createScope, withScope } from '../core/scope.js';
import { computed, readonlySignal, signal, type ReadonlySignal } from '../core/signal.js';
import { createOverlay, type Overlay, type OverlayEntry, type OverlayHost } from '../overlay/overlay.js';
import { DEFAULT_ROUTE_NAME, expandInitialRoute } from './initial-route.js';
import type { NavigatorObserver } from './observer.js';
import {
  bindRouteNavigator,
  type AnyRoute,
  type Route,
  type RouteFactory,
  type RoutePredicate,
  type RouteSettings,
} from './route.js';

/** Public navigator API returned by `createNavigator`. */
export interface Navigator {
  readonly label: string;
  readonly overlay: Overlay;
  /** Routes from bottom to top. Read-only view of the live stack. */
  readonly history: readonly AnyRoute[];
  /** Snapshot of `history`, updated after every mutation. */
  readonly routes: ReadonlySignal<readonly AnyRoute[]>;
  readonly current: ReadonlySignal<AnyRoute | null>;
  /** Bumped by `invalidate()`. */
  readonly revision: ReadonlySignal<number>;
  readonly observers: readonly NavigatorObserver[];
  readonly mounted: boolean;
  readonly disposed: boolean;

  mount(): void;
  dispose(): void;

  push<T>(route: Route<T>): Promise<T | null>;
  pushNamed(name: string): Promise<unknown>;
  replace(oldRoute: AnyRoute, newRoute: AnyRoute): void;
  pushReplacement<T>(newRoute: Route<T>, result?: unknown): Promise<T | null>;
  pushReplacementNamed(name: string, result?: unknown): Promise<unknown>;
  replaceRouteBelow(anchorRoute: AnyRoute, newRoute: AnyRoute): void;
  removeRouteBelow(anchorRoute: AnyRoute): void;
  pushAndRemoveUntil<T>(newRoute: Route<T>, predicate: RoutePredicate): Promise<T | null>;
  pushNamedAndRemoveUntil(name: string, predicate: RoutePredicate): Promise<unknown>;
  maybePop(result?: unknown): Promise<boolean>;
  pop(result?: unknown): boolean;
  popAndPushNamed(name: string, result?: unknown): Promise<unknown>;
  popUntil(predicate: RoutePredicate): void;
  removeRoute(route: AnyRoute): void;
  finalizeRoute(route: AnyRoute): void;
  /** True while `route` was popped but its exit has not been finalized. */
  isPendingFinalize(route: AnyRoute): boolean;
  canPop(): boolean;
  routeNamed(name: string): AnyRoute;
  /** Signals that a route's presentation changed without a stack mutation. */
  invalidate(): void;

  addObserver(observer: NavigatorObserver): void;
  removeObserver(observer: NavigatorObserver): boolean;
  clearObservers(): void;
}

/**
 * Configuration for `createNavigator`.
 *
 * `onGenerateRoute` resolves names; `onUnknownRoute` is the fallback and must
 * produce a route. `initialRoute` is pushed on `mount()`.
 */
export interface NavigatorConfig {
  host: OverlayHost;
  onGenerateRoute: RouteFactory;
  onUnknownRoute?: RouteFactory;
  /** Default: "/". */
  initialRoute?: string;
  observers?: NavigatorObserver[];
  /** Used in diagnostics. Default: "navigator". */
  label?: string;
  onInvalidate?: (navigator: Navigator) => void;
}

type ObserverEvent = 'didPush' | 'didPop' | 'didRemove';

/**
 * Create a navigator: a stack of routes rendered through an overlay.
 *
 * Every mutation is synchronous. Observers hear about it after the stack is
 * consistent again; teardown that waits on a transition is deferred to the
 * new route's `didPush()`.
 */
export function createNavigator(config: NavigatorConfig): Navigator {
  const label = config.label ?? 'navigator';
  const scope = createScope();
  const overlay = createOverlay(config.host);
  const history: AnyRoute[] = [];
  const observers: NavigatorObserver[] = [];
  /** Popped routes whose exit is still running. */
  const poppedRoutes = new Set<AnyRoute>();
  /** Replaced or removed routes waiting for the new route's entrance. */
  const retiringRoutes = new Set<AnyRoute>();
  let mounted = false;
  let disposed = false;

  const { routesSignal, currentSignal, revisionSignal } = withScope(scope, () => {
    const routesSignal = signal<readonly AnyRoute[]>([]);
    const currentSignal = computed<AnyRoute | null>(() => {
      const list = routesSignal();
      return list.length > 0 ? list[list.length - 1] : null;
    });
    const revisionSignal = signal(0);
    return { routesSignal, currentSignal, revisionSignal };
  });

  for (const observer of config.observers ?? []) {
    addObserver(observer);
  }

  function ensureActive(operation: string): void {
    assertPrecondition(!disposed, operation, `called on disposed navigator "${label}".`);
  }

  function top(): AnyRoute | null {
    return history.length > 0 ? history[history.length - 1] : null;
  }

  function publish(): void {
    routesSignal.set([...history]);
  }

  function notify(event: ObserverEvent, route: AnyRoute, previousRoute: AnyRoute | null): void {
    for (const observer of [...observers]) {
      try {
        observer[event](route, previousRoute);
      } catch (error) {
        reportError(error, `observer.${event}`);
      }
    }
  }

  /** Last entry of the topmost route that has any. */
  function currentOverlayEntry(): OverlayEntry | null {
    for (let i = history.length - 1; i >= 0; i -= 1) {
      const entries = history[i].entries;
      if (entries.length > 0) return entries[entries.length - 1];
    }
    return null;
  }

  function assertDetached(route: AnyRoute, operation: string): void {
    assertPrecondition(route.navigator === null && !route.disposed, operation, 'called with a route that already belongs to a navigator.');
    assertPrecondition(route.entries.length === 0, operation, 'called with a route that already has overlay entries.');
  }

  function assertOwned(route: AnyRoute, operation: string): void {
    assertPrecondition(route.navigator === navigator, operation, `called with a route that does not belong to navigator "${label}".`);
  }

  function attach(route: AnyRoute, insertionPoint: OverlayEntry | null): void {
    bindRouteNavigator(route, navigator);
    try {
      route.install(insertionPoint);
    } catch (error) {
      bindRouteNavigator(route, null);
      throw error;
    }
  }

  /** Disposes `routes` once `entrance` settles, unless the navigator got there first. */
  function retireAfter(entrance: Promise<void>, routes: AnyRoute[], beforeDispose?: (route: AnyRoute) => void): void {
    for (const route of routes) retiringRoutes.add(route);
    void entrance
      .then(() => {
        for (const route of routes) {
          if (!retiringRoutes.delete(route)) continue;
          try {
            beforeDispose?.(route);
          } catch (error) {
            reportError(error, 'navigator.retire');
          }
          try {
            if (!route.disposed) route.dispose();
          } catch (error) {
            reportError(error, 'navigator.retire');
          }
        }
      })
      .catch((error: unknown) => reportError(error, 'navigator.retire'));
  }

  function generateRoute(name: string): AnyRoute | null {
    const settings: RouteSettings = { name, isInitialRoute: history.length === 0 };
    return config.onGenerateRoute(settings);
  }

  function routeNamed(name: string): AnyRoute {
    ensureActive('routeNamed()');
    const generated = generateRoute(name);
    if (generated) return generated;

    const settings: RouteSettings = { name, isInitialRoute: history.length === 0 };
    const fallback = config.onUnknownRoute ? config.onUnknownRoute(settings) : null;
    if (!fallback) {
      const reason = config.onUnknownRoute ? 'onUnknownRoute returned null' : 'no onUnknownRoute is configured';
      throw new Error(`[Waypost] Navigator "${label}" could not resolve route "${name}": onGenerateRoute returned null and ${reason}.`);
    }
    return fallback;
  }

  function initialRoutes(): AnyRoute[] {
    const initialName = config.initialRoute ?? DEFAULT_ROUTE_NAME;
    const names = expandInitialRoute(initialName);

    if (names.length > 1) {
      const planned = names.map((name) => ({ name, route: generateRoute(name) }));
      const missing = planned.filter((plan) => plan.route === null).map((plan) => `"${plan.name}"`);
      const resolved = planned.flatMap((plan) => (plan.route ? [plan.route] : []));
      if (missing.length === 0) return resolved;

      warn(
        `Could not navigate to initial route "${initialName}". ` +
          `No route was generated for ${missing.join(', ')}; starting at "${DEFAULT_ROUTE_NAME}" instead.`
      );
      return [routeNamed(DEFAULT_ROUTE_NAME)];
    }

    const named = initialName === DEFAULT_ROUTE_NAME ? null : generateRoute(initialName);
    return [named ?? routeNamed(DEFAULT_ROUTE_NAME)];
  }

  function mount(): void {
    ensureActive('mount()');
    if (mounted) return;
    mounted = true;

    for (const observer of observers) observer.navigator = navigator;
    const routes = initialRoutes();
    batch(() => {
      for (const route of routes) push(route);
    });
    overlay.mount();
  }

  function dispose(): void {
    if (disposed) return;

    const routes = [...poppedRoutes, ...retiringRoutes, ...[...history].reverse()];
    poppedRoutes.clear();
    retiringRoutes.clear();
    history.length = 0;
    for (const route of routes) {
      if (route.disposed) continue;
      try {
        route.dispose();
      } catch (error) {
        reportError(error, 'navigator.dispose');
      }
    }

    for (const observer of observers) {
      if (observer.navigator === navigator) observer.navigator = null;
    }
    observers.length = 0;
    publish();
    disposed = true;
    scope.dispose();
  }

  function push<T>(route: Route<T>): Promise<T | null> {
    ensureActive('push()');
    assertDetached(route, 'push()');
    const oldRoute = top();
    attach(route, currentOverlayEntry());
    history.push(route);
    void route.didPush().catch((error: unknown) => reportError(error, 'route.didPush'));
    route.didChangeNext(null);
    oldRoute?.didChangeNext(route);
    publish();
    notify('didPush', route, oldRoute);
    return route.popped;
  }

  function replace(oldRoute: AnyRoute, newRoute: AnyRoute): void {
    ensureActive('replace()');
    if (oldRoute === newRoute) return;
    assertOwned(oldRoute, 'replace()');
    assertDetached(newRoute, 'replace()');
    assertPrecondition(oldRoute.entries.length > 0, 'replace()', 'called with an old route that has no overlay entries.');
    const index = history.indexOf(oldRoute);
    assertPrecondition(index !== -1, 'replace()', 'called with an old route that is not in the history.');

    const oldEntries = oldRoute.entries;
    attach(newRoute, oldEntries[oldEntries.length - 1]);
    history[index] = newRoute;
    newRoute.didReplace(oldRoute);
    if (index + 1 < history.length) {
      newRoute.didChangeNext(history[index + 1]);
      history[index + 1].didChangePrevious(newRoute);
    } else {
      newRoute.didChangeNext(null);
    }
    if (index > 0) history[index - 1].didChangeNext(newRoute);
    oldRoute.dispose();
    publish();
  }

  function pushReplacement<T>(newRoute: Route<T>, result: unknown = null): Promise<T | null> {
    ensureActive('pushReplacement()');
    const oldRoute = top();
    assertPrecondition(oldRoute !== null, 'pushReplacement()', 'called on an empty history.');
    assertPrecondition(oldRoute.entries.length > 0, 'pushReplacement()', 'called while the current route has no overlay entries.');
    assertDetached(newRoute, 'pushReplacement()');

    const index = history.length - 1;
    attach(newRoute, currentOverlayEntry());
    history[index] = newRoute;
    retireAfter(newRoute.didPush(), [oldRoute], (route) => route.didComplete(result ?? route.currentResult));
    newRoute.didChangeNext(null);
    if (index > 0) history[index - 1].didChangeNext(newRoute);
    publish();
    notify('didPush', newRoute, oldRoute);
    return newRoute.popped;
  }

  function replaceRouteBelow(anchorRoute: AnyRoute, newRoute: AnyRoute): void {
    ensureActive('replaceRouteBelow()');
    assertOwned(anchorRoute, 'replaceRouteBelow()');
    const index = history.indexOf(anchorRoute);
    assertPrecondition(index > 0, 'replaceRouteBelow()', 'called with an anchor that has no route below it.');
    replace(history[index - 1], newRoute);
  }

  function removeRouteBelow(anchorRoute: AnyRoute): void {
    ensureActive('removeRouteBelow()');
    assertOwned(anchorRoute, 'removeRouteBelow()');
    const index = history.indexOf(anchorRoute) - 1;
    assertPrecondition(index >= 0, 'removeRouteBelow()', 'called with an anchor that has no route below it.');
    const target = history[index];
    assertOwned(target, 'removeRouteBelow()');
    assertPrecondition(target.entries.length === 0, 'removeRouteBelow()', 'called while the route below still has overlay entries.');

    history.splice(index, 1);
    const nextRoute = index < history.length ? history[index] : null;
    const previousRoute = index > 0 ? history[index - 1] : null;
    previousRoute?.didChangeNext(nextRoute);
    nextRoute?.didChangePrevious(previousRoute);
    target.dispose();
    publish();
  }

  function pushAndRemoveUntil<T>(newRoute: Route<T>, predicate: RoutePredicate): Promise<T | null> {
    ensureActive('pushAndRemoveUntil()');
    let keep = history.length;
    while (keep > 0 && !predicate(history[keep - 1])) {
      const route = history[keep - 1];
      assertOwned(route, 'pushAndRemoveUntil()');
      assertPrecondition(route.entries.length > 0, 'pushAndRemoveUntil()', 'would remove a route that has no overlay entries.');
      keep -= 1;
    }
    assertDetached(newRoute, 'pushAndRemoveUntil()');

    const removedRoutes = history.splice(keep).reverse();
    const oldRoute = top();
    attach(newRoute, currentOverlayEntry());
    history.push(newRoute);
    retireAfter(newRoute.didPush(), removedRoutes);
    newRoute.didChangeNext(null);
    oldRoute?.didChangeNext(newRoute);
    publish();
    notify('didPush', newRoute, oldRoute);
    return newRoute.popped;
  }

  function maybePop(result: unknown = null): Promise<boolean> {
    ensureActive('maybePop()');
    const route = top();
    assertPrecondition(route !== null, 'maybePop()', 'called on an empty history.');
    assertOwned(route, 'maybePop()');

    return route.willPop().then((disposition) => {
      if (disposition === 'bubble') return false;
      // Pop only the route that answered, and only while it is still on top.
      if (disposition === 'pop' && !disposed && top() === route) pop(result);
      return true;
    });
  }

  function pop(result: unknown = null): boolean {
    ensureActive('pop()');
    const route = top();
    assertPrecondition(route !== null, 'pop()', 'called on an empty history.');
    assertOwned(route, 'pop()');

    if (history.length === 1 && !route.willHandlePopInternally) return false;
    if (!route.didPop(result ?? route.currentResult)) return true;
    if (history.length === 1) return false;

    history.pop();
    // Routes that did not finalize inside didPop keep their back-reference until they do.
    if (route.navigator === navigator) poppedRoutes.add(route);
    const newTop = history[history.length - 1];
    newTop.didPopNext(route);
    publish();
    notify('didPop', route, newTop);
    return true;
  }

  function popUntil(predicate: RoutePredicate): void {
    ensureActive('popUntil()');
    while (!predicate(top())) {
      if (!pop()) {
        throw new Error(`[Waypost] popUntil() reached the last route of navigator "${label}" without matching the predicate.`);
      }
    }
  }

  function removeRoute(route: AnyRoute): void {
    ensureActive('removeRoute()');
    assertOwned(route, 'removeRoute()');
    const index = history.indexOf(route);
    assertPrecondition(index !== -1, 'removeRoute()', 'called with a route that is not in the history.');

    const previousRoute = index > 0 ? history[index - 1] : null;
    const nextRoute = index + 1 < history.length ? history[index + 1] : null;
    history.splice(index, 1);
    previousRoute?.didChangeNext(nextRoute);
    nextRoute?.didChangePrevious(previousRoute);
    publish();
    notify('didRemove', route, previousRoute);
    route.dispose();
  }

  function finalizeRoute(route: AnyRoute): void {
    assertOwned(route, 'finalizeRoute()');
    poppedRoutes.delete(route);
    route.dispose();
  }

  function canPop(): boolean {
    ensureActive('canPop()');
    assertPrecondition(history.length > 0, 'canPop()', 'called on an empty history.');
    return history.length > 1 || history[0].willHandlePopInternally;
  }

  function invalidate(): void {
    if (disposed) return;
    revisionSignal.update((revision) => revision + 1);
    if (!config.onInvalidate) return;
    try {
      config.onInvalidate(navigator);
    } catch (error) {
      reportError(error, 'navigator.onInvalidate');
    }
  }

  function addObserver(observer: NavigatorObserver): void {
    ensureActive('addObserver()');
    assertPrecondition(
      observer.navigator === null && !observers.includes(observer),
      'addObserver()',
      'called with an observer that is already observing a navigator.'
    );
    observers.push(observer);
    if (mounted) observer.navigator = navigator;
  }

  function removeObserver(observer: NavigatorObserver): boolean {
    const index = observers.indexOf(observer);
    if (index === -1) return false;
    observers.splice(index, 1);
    if (observer.navigator === navigator) observer.navigator = null;
    return true;
  }

  function clearObservers(): void {
    for (const observer of observers.splice(0)) {
      if (observer.navigator === navigator) observer.navigator = null;
    }
  }

  const navigator: Navigator = {
    label,
    overlay,
    history,
    routes: readonlySignal(routesSignal),
    current: readonlySignal(currentSignal),
    revision: readonlySignal(revisionSignal),
    observers,
    get mounted() {
      return mounted;
    },
    get disposed() {
      return disposed;
    },
    mount,
    dispose,
    push,
    pushNamed: (name) => push(routeNamed(name)),
    replace,
    pushReplacement,
    pushReplacementNamed: (name, result) => pushReplacement(routeNamed(name), result),
    replaceRouteBelow,
    removeRouteBelow,
    pushAndRemoveUntil,
    pushNamedAndRemoveUntil: (name, predicate) => pushAndRemoveUntil(routeNamed(name), predicate),
    maybePop,
    pop,
    popAndPushNamed(name, result) {
      pop(result);
      return push(routeNamed(name));
    },
    popUntil,
    removeRoute,
    finalizeRoute,
    isPendingFinalize: (route) => poppedRoutes.has(route),
    canPop,
    routeNamed,
    invalidate,
    addObserver,
    removeObserver,
    clearObservers,
  };

  return navigator;
}
