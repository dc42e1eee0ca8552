import type { OverlayHost, Visibility } from './overlay.js';

/**
 * Headless overlay host.
 *
 * Mirrors the overlay into a plain array so the stack can run (and be
 * inspected) without any renderer attached.
 */
export interface MemoryOverlayHost extends OverlayHost {
  /** Realized layers, bottom to top. */
  readonly layers: readonly unknown[];
  visibilityOf(layer: unknown): Visibility | undefined;
  /** Layers currently visible, bottom to top. */
  visibleLayers(): unknown[];
}

export function createMemoryOverlayHost(): MemoryOverlayHost {
  const layers: unknown[] = [];
  const visibility = new Map<unknown, Visibility>();

  return {
    get layers() {
      return layers;
    },
    attach(layer, index) {
      layers.splice(index, 0, layer);
      visibility.set(layer, 'visible');
    },
    detach(layer, index) {
      if (layers[index] !== layer) {
        throw new Error(`[Waypost] Memory host detach mismatch at index ${index}.`);
      }
      layers.splice(index, 1);
      visibility.delete(layer);
    },
    setVisibility(layer, next) {
      visibility.set(layer, next);
    },
    visibilityOf(layer) {
      return visibility.get(layer);
    },
    visibleLayers() {
      return layers.filter((layer) => visibility.get(layer) === 'visible');
    },
  };
}
