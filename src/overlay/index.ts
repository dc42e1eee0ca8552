export {
  createOverlay,
  createOverlayEntry,
  type Overlay,
  type OverlayEntry,
  type OverlayHost,
  type LayerContext,
  type LayerFactory,
  type Visibility,
  type CreateOverlayOptions,
  type CreateOverlayEntryOptions,
} from "./overlay.js";
export { createMemoryOverlayHost, type MemoryOverlayHost } from "./memory-host.js";
export { createDomOverlayHost } from "./dom-host.js";
