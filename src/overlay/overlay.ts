import { assertPrecondition } from '../core/dev.js';

/** Computed visibility of an overlay entry's layer. `gone` layers are hidden but retained. */
export type Visibility = 'visible' | 'gone';

/** Passed to a layer factory when its entry is inserted. */
export interface LayerContext {
  overlay: Overlay;
  entry: OverlayEntry;
  /** Position of the entry in the overlay (0 = bottom) at insertion time. */
  index: number;
}

/**
 * Realizes the visual layer of an entry. Invoked exactly once, when the entry
 * is inserted. The returned value is opaque to the overlay and handed to the host.
 */
export type LayerFactory = (context: LayerContext) => unknown;

/**
 * Rendering collaborator of an overlay.
 *
 * The overlay owns ordering and visibility; the host only mirrors them onto
 * whatever it draws with (DOM nodes, canvas layers, terminal panes, ...).
 */
export interface OverlayHost {
  attach(layer: unknown, index: number): void;
  detach(layer: unknown, index: number): void;
  setVisibility(layer: unknown, visibility: Visibility): void;
}

/**
 * A single layer slot, owned by at most one overlay at a time.
 *
 * Created standalone; gains an owner on `insert`/`insertAll` and loses it on
 * `remove()`. `remove()` may only be called while owned.
 */
export interface OverlayEntry {
  readonly build: LayerFactory;
  /** Whether this entry occludes everything below it. Changing it recomputes visibility. */
  opaque: boolean;
  /** Owning overlay, or null while detached. */
  readonly overlay: Overlay | null;
  /** Debug label for diagnostics. */
  readonly label: string | undefined;
  remove(): void;
}

export interface CreateOverlayEntryOptions {
  /** Default: true. */
  opaque?: boolean;
  label?: string;
}

export interface Overlay {
  /** Entries from bottom to top. */
  readonly entries: readonly OverlayEntry[];
  readonly mounted: boolean;
  insert(entry: OverlayEntry, above?: OverlayEntry | null): void;
  insertAll(entries: readonly OverlayEntry[], above?: OverlayEntry | null): void;
  visibilityOf(entry: OverlayEntry): Visibility;
  layerOf(entry: OverlayEntry): unknown;
  /**
   * First realization of the overlay: inserts `initialEntries` once.
   * Returns true on the call that mounted, false afterwards.
   */
  mount(): boolean;
}

export interface CreateOverlayOptions {
  /** Entries inserted when the overlay is first mounted. */
  initialEntries?: readonly OverlayEntry[];
}

/** Hooks an overlay exposes to the entries it owns. */
interface OverlayInternals {
  overlay: Overlay;
  remove(entry: OverlayEntry): void;
  refresh(): void;
}

const entryOwners = new WeakMap<OverlayEntry, OverlayInternals>();

export function createOverlayEntry(build: LayerFactory, options: CreateOverlayEntryOptions = {}): OverlayEntry {
  let opaque = options.opaque ?? true;

  const entry: OverlayEntry = {
    build,
    label: options.label,
    get opaque() {
      return opaque;
    },
    set opaque(value: boolean) {
      if (opaque === value) return;
      const owner = entryOwners.get(entry);
      assertPrecondition(owner !== undefined, 'OverlayEntry.opaque', 'cannot change on an entry that is not in an overlay.');
      opaque = value;
      owner.refresh();
    },
    get overlay() {
      return entryOwners.get(entry)?.overlay ?? null;
    },
    remove() {
      const owner = entryOwners.get(entry);
      assertPrecondition(owner !== undefined, 'OverlayEntry.remove()', 'called on an entry that is not in an overlay.');
      entryOwners.delete(entry);
      owner.remove(entry);
    },
  };

  return entry;
}

interface Slot {
  entry: OverlayEntry;
  layer: unknown;
  visibility: Visibility;
}

/**
 * Creates an overlay: an ordered list of entries whose visibility is derived
 * from opacity. Scanning top-down, every entry up to and including the first
 * opaque one is visible; everything below it is gone.
 */
export function createOverlay(host: OverlayHost, options: CreateOverlayOptions = {}): Overlay {
  const slots: Slot[] = [];
  const initialEntries = options.initialEntries ?? [];
  let mounted = false;

  const indexOf = (entry: OverlayEntry): number => slots.findIndex((slot) => slot.entry === entry);

  const isMember = (entry: OverlayEntry): boolean => entryOwners.get(entry) === internals && indexOf(entry) !== -1;

  const slotOf = (entry: OverlayEntry, operation: string): Slot => {
    const slot = slots[indexOf(entry)];
    assertPrecondition(slot !== undefined, operation, 'called with an entry that is not in this overlay.');
    return slot;
  };

  const insertionIndex = (above: OverlayEntry | null | undefined, operation: string): number => {
    if (above == null) return slots.length;
    assertPrecondition(isMember(above), operation, 'expected `above` to be an entry of this overlay.');
    return indexOf(above) + 1;
  };

  // Hosts receive layers as visible; `updateVisibility` hides them afterwards.
  const realize = (entry: OverlayEntry, index: number): void => {
    const layer = entry.build({ overlay, entry, index });
    host.attach(layer, index);
    entryOwners.set(entry, internals);
    slots.splice(index, 0, { entry, layer, visibility: 'visible' });
  };

  const updateVisibility = (): void => {
    let onstage = true;
    for (let i = slots.length - 1; i >= 0; i -= 1) {
      const slot = slots[i];
      const next: Visibility = onstage ? 'visible' : 'gone';
      if (slot.visibility !== next) {
        slot.visibility = next;
        host.setVisibility(slot.layer, next);
      }
      if (slot.entry.opaque) onstage = false;
    }
  };

  const overlay: Overlay = {
    get entries() {
      return slots.map((slot) => slot.entry);
    },
    get mounted() {
      return mounted;
    },
    insert(entry, above = null) {
      assertPrecondition(entry.overlay === null, 'Overlay.insert()', 'called with an entry that is already in an overlay.');
      const index = insertionIndex(above, 'Overlay.insert()');
      realize(entry, index);
      updateVisibility();
    },
    insertAll(entries, above = null) {
      const index = insertionIndex(above, 'Overlay.insertAll()');
      if (entries.length === 0) return;
      const seen = new Set<OverlayEntry>();
      for (const entry of entries) {
        assertPrecondition(
          entry.overlay === null && !seen.has(entry),
          'Overlay.insertAll()',
          'called with an entry that is already in an overlay.'
        );
        seen.add(entry);
      }
      let realized = 0;
      try {
        for (const entry of entries) {
          realize(entry, index + realized);
          realized += 1;
        }
      } catch (error) {
        // Unwind what was already attached, top first.
        for (let offset = realized - 1; offset >= 0; offset -= 1) {
          const [slot] = slots.splice(index + offset, 1);
          entryOwners.delete(slot.entry);
          host.detach(slot.layer, index + offset);
        }
        throw error;
      }
      updateVisibility();
    },
    visibilityOf(entry) {
      return slotOf(entry, 'Overlay.visibilityOf()').visibility;
    },
    layerOf(entry) {
      return slotOf(entry, 'Overlay.layerOf()').layer;
    },
    mount() {
      if (mounted) return false;
      mounted = true;
      overlay.insertAll(initialEntries);
      return true;
    },
  };

  const internals: OverlayInternals = {
    overlay,
    remove(entry) {
      const index = indexOf(entry);
      const [slot] = slots.splice(index, 1);
      host.detach(slot.layer, index);
      updateVisibility();
    },
    refresh: updateVisibility,
  };

  return overlay;
}
