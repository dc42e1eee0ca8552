import type { RouteCapability } from '../route.js';

export interface ModalFacet {
  readonly barrierDismissible: boolean;
  /** Pops the route with a null result if it is dismissible and current. */
  dismiss(): boolean;
}

export interface ModalCapabilityOptions {
  barrierDismissible: boolean;
}

/**
 * Blocks interaction with the routes below. Asks the navigator to re-render
 * when its neighbors or its local history change, since the barrier and page
 * may depend on both.
 */
export function modalCapability<T>(options: ModalCapabilityOptions): RouteCapability<T> {
  return ({ route }) => ({
    facets: {
      modal: {
        barrierDismissible: options.barrierDismissible,
        dismiss() {
          const navigator = route.navigator;
          if (!options.barrierDismissible || !navigator || !route.isCurrent) return false;
          return navigator.pop(null);
        },
      },
    },
    didChangePrevious(next, previousRoute) {
      next(previousRoute);
      route.navigator?.invalidate();
    },
    changedInternalState(next) {
      next();
      route.navigator?.invalidate();
    },
  });
}
