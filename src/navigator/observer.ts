import type { AnyRoute } from './route.js';
import type { Navigator } from './navigator.js';

/**
 * Receives stack mutations after they are applied, synchronously and in
 * registration order. `navigator` is assigned when the observer starts
 * observing and cleared when it is removed.
 */
export interface NavigatorObserver {
  navigator: Navigator | null;
  didPush(route: AnyRoute, previousRoute: AnyRoute | null): void;
  didPop(route: AnyRoute, previousRoute: AnyRoute | null): void;
  didRemove(route: AnyRoute, previousRoute: AnyRoute | null): void;
}

export type NavigatorObserverHooks = Partial<Pick<NavigatorObserver, 'didPush' | 'didPop' | 'didRemove'>>;

/**
 * Creates an observer from the hooks you care about.
 *
 * @example
 * const analytics = createNavigatorObserver({
 *   didPush: (route) => track('screen', route.settings.name),
 * });
 */
export function createNavigatorObserver(hooks: NavigatorObserverHooks = {}): NavigatorObserver {
  return {
    navigator: null,
    didPush: hooks.didPush ?? (() => {}),
    didPop: hooks.didPop ?? (() => {}),
    didRemove: hooks.didRemove ?? (() => {}),
  };
}
