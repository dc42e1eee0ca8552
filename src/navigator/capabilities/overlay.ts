import { assertPrecondition } from '../../core/dev.js';
import { withScope } from '../../core/scope.js';
import type { OverlayEntry } from '../../overlay/overlay.js';
import type { Route, RouteCapability } from '../route.js';

export interface OverlayCapabilityOptions<T> {
  /** Creates the route's entries, bottom to top. Called once, on install. */
  buildEntries(route: Route<T>): OverlayEntry[];
  /**
   * Finalize as soon as a pop is accepted. Routes that animate out set this
   * to false and finalize when the exit ends.
   */
  finishedWhenPopped: boolean;
}

/** Gives a route a visual presence: its entries live in the navigator's overlay. */
export function overlayCapability<T>(options: OverlayCapabilityOptions<T>): RouteCapability<T> {
  return ({ route, entries }) => ({
    install(next, insertionPoint) {
      assertPrecondition(entries.length === 0, 'Route.install()', 'called on a route that already has overlay entries.');
      const navigator = route.navigator;
      assertPrecondition(navigator !== null, 'Route.install()', 'called on a route without a navigator.');
      const created = options.buildEntries(route);
      // Layer factories run in the route scope, so their effects end with the route.
      withScope(route.scope, () => navigator.overlay.insertAll(created, insertionPoint));
      entries.push(...created);
      next(insertionPoint);
    },
    didPop(next, result) {
      const proceed = next(result);
      if (proceed && options.finishedWhenPopped) route.navigator?.finalizeRoute(route);
      return proceed;
    },
    dispose(next) {
      for (const entry of entries.splice(0)) {
        if (entry.overlay) entry.remove();
      }
      next();
    },
  });
}
