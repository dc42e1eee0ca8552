export {
  createRoute,
  type AnyRoute,
  type PopDisposition,
  type Route,
  type RouteCapability,
  type RouteCapabilityContext,
  type RouteCapabilityHooks,
  type RouteCapabilityInstance,
  type RouteFacets,
  type RouteFactory,
  type RouteLifecycle,
  type RouteOptions,
  type RoutePredicate,
  type RouteSettings,
} from "./route.js";
export * from "./routes.js";
export * from "./navigator.js";
export * from "./observer.js";
export * from "./transitions.js";
export { DEFAULT_ROUTE_NAME, expandInitialRoute } from "./initial-route.js";
export {
  createLocalHistoryEntry,
  localHistoryCapability,
  type LocalHistory,
  type LocalHistoryEntry,
} from "./capabilities/local-history.js";
export {
  transitionCapability,
  type TransitionCapabilityOptions,
  type TransitionDirection,
  type TransitionDriver,
  type TransitionFacet,
  type TransitionHandle,
  type TransitionOutcome,
  type TransitionPhase,
  type TransitionRequest,
} from "./capabilities/transition.js";
export { modalCapability, type ModalCapabilityOptions, type ModalFacet } from "./capabilities/modal.js";
export { overlayCapability, type OverlayCapabilityOptions } from "./capabilities/overlay.js";
