import type { OverlayHost, Visibility } from './overlay.js';

const VISIBILITY_ATTRIBUTE = 'data-overlay-visibility';

function isElement(value: unknown): value is Element {
  return (
    typeof value === 'object' &&
    value !== null &&
    'nodeType' in value &&
    value.nodeType === 1
  );
}

function expectElement(layer: unknown, operation: string): Element {
  if (!isElement(layer)) {
    throw new Error(`[Waypost] DOM overlay host ${operation}() expects an Element layer.`);
  }
  return layer;
}

/**
 * Overlay host that renders layers as children of `container`.
 *
 * Child order follows overlay order (first child = bottom layer). Layers that
 * are `gone` keep their place in the tree and get the `hidden` attribute.
 */
export function createDomOverlayHost(container: Element): OverlayHost {
  return {
    attach(layer, index) {
      const element = expectElement(layer, 'attach');
      element.setAttribute(VISIBILITY_ATTRIBUTE, 'visible');
      container.insertBefore(element, container.children[index] ?? null);
    },
    detach(layer) {
      const element = expectElement(layer, 'detach');
      if (element.parentNode === container) container.removeChild(element);
    },
    setVisibility(layer, visibility: Visibility) {
      const element = expectElement(layer, 'setVisibility');
      element.setAttribute(VISIBILITY_ATTRIBUTE, visibility);
      if (visibility === 'gone') element.setAttribute('hidden', '');
      else element.removeAttribute('hidden');
    },
  };
}
