import { test } from 'node:test';
import assert from 'node:assert/strict';

import { createOverlay, createOverlayEntry, type LayerContext } from '../src/overlay/overlay.js';
import { createMemoryOverlayHost } from '../src/overlay/memory-host.js';
import { createNavigator } from '../src/navigator/navigator.js';
import { createOverlayRoute } from '../src/navigator/routes.js';

const entry = (name: string, opaque = true) => createOverlayEntry(() => name, { opaque, label: name });

test('insert appends by default and places entries right above `above`', () => {
  const host = createMemoryOverlayHost();
  const overlay = createOverlay(host);
  const one = entry('1');
  const two = entry('2');
  const three = entry('3');

  overlay.insert(one);
  overlay.insert(two);
  overlay.insert(three, one);

  assert.deepEqual(overlay.entries, [one, three, two]);
  assert.deepEqual(host.layers, ['1', '3', '2']);
  assert.equal(three.overlay, overlay);
});

test('insertAll keeps input order above the anchor', () => {
  const host = createMemoryOverlayHost();
  const overlay = createOverlay(host);
  const one = entry('1');
  const two = entry('2');

  overlay.insertAll([one, two]);
  overlay.insertAll([entry('3'), entry('4')], one);

  assert.deepEqual(host.layers, ['1', '3', '4', '2']);
});

test('an opaque entry hides everything below it', () => {
  const host = createMemoryOverlayHost();
  const overlay = createOverlay(host);
  const bottom = entry('bottom');
  const top = entry('top');

  overlay.insertAll([bottom, top]);

  assert.equal(overlay.visibilityOf(bottom), 'gone');
  assert.equal(overlay.visibilityOf(top), 'visible');
  assert.deepEqual(host.visibleLayers(), ['top']);
});

test('an opaque entry below a translucent one stays visible', () => {
  const host = createMemoryOverlayHost();
  const overlay = createOverlay(host);
  const bottom = entry('bottom');
  const top = entry('top', false);

  overlay.insertAll([entry('floor'), bottom, top]);

  assert.equal(overlay.visibilityOf(bottom), 'visible');
  assert.equal(overlay.visibilityOf(top), 'visible');
  assert.deepEqual(host.visibleLayers(), ['bottom', 'top']);
});

test('changing opacity and removing entries recompute visibility', () => {
  const host = createMemoryOverlayHost();
  const overlay = createOverlay(host);
  const bottom = entry('bottom');
  const top = entry('top');
  overlay.insertAll([bottom, top]);

  top.opaque = false;
  assert.deepEqual(host.visibleLayers(), ['bottom', 'top']);

  top.opaque = true;
  assert.deepEqual(host.visibleLayers(), ['top']);

  top.remove();
  assert.equal(top.overlay, null);
  assert.deepEqual(host.layers, ['bottom']);
  assert.equal(overlay.visibilityOf(bottom), 'visible');
});

test('layer factory runs exactly once with the insertion context', () => {
  const overlay = createOverlay(createMemoryOverlayHost());
  const contexts: LayerContext[] = [];
  const tracked = createOverlayEntry((context) => {
    contexts.push(context);
    return 'tracked';
  });

  overlay.insert(entry('a'));
  overlay.insert(tracked);
  tracked.opaque = false;
  overlay.insert(entry('b'));

  assert.equal(contexts.length, 1);
  assert.equal(contexts[0].index, 1);
  assert.equal(contexts[0].entry, tracked);
  assert.equal(overlay.layerOf(tracked), 'tracked');
});

test('ownership preconditions', () => {
  const overlay = createOverlay(createMemoryOverlayHost());
  const other = createOverlay(createMemoryOverlayHost());
  const owned = entry('owned');
  const detached = entry('detached');
  overlay.insert(owned);

  assert.throws(() => other.insert(owned), /Overlay\.insert\(\) called with an entry that is already in an overlay/);
  assert.throws(() => other.insert(detached, owned), /expected `above` to be an entry of this overlay/);
  assert.throws(() => {
    detached.opaque = false;
  }, /OverlayEntry\.opaque cannot change on an entry that is not in an overlay/);
  assert.throws(() => detached.remove(), /OverlayEntry\.remove\(\) called on an entry that is not in an overlay/);

  owned.remove();
  assert.throws(() => owned.remove(), /OverlayEntry\.remove\(\)/);
});

test('insertAll validates every entry before inserting any', () => {
  const host = createMemoryOverlayHost();
  const overlay = createOverlay(host);
  const fresh = entry('fresh');

  assert.throws(() => overlay.insertAll([fresh, fresh]), /Overlay\.insertAll\(\)/);
  assert.deepEqual(host.layers, []);
  assert.equal(fresh.overlay, null);

  overlay.insertAll([]);
  assert.deepEqual(overlay.entries, []);
});

test('setting the same opacity on a detached entry is a no-op', () => {
  const detached = entry('detached');
  detached.opaque = true;
  assert.equal(detached.opaque, true);
});

test('mount inserts initial entries once', () => {
  const host = createMemoryOverlayHost();
  const overlay = createOverlay(host, { initialEntries: [entry('a'), entry('b', false)] });

  assert.equal(overlay.mounted, false);
  assert.equal(overlay.mount(), true);
  assert.equal(overlay.mount(), false);
  assert.equal(overlay.mounted, true);
  assert.deepEqual(host.layers, ['a', 'b']);
  assert.deepEqual(host.visibleLayers(), ['a', 'b']);
});

test('insertAll unwinds the entries it attached when a later layer factory throws', () => {
  const host = createMemoryOverlayHost();
  const overlay = createOverlay(host);
  const home = entry('home');
  const barrier = entry('barrier', false);
  const broken = createOverlayEntry(() => {
    throw new Error('layer failed');
  });
  overlay.insert(home);

  assert.throws(() => overlay.insertAll([barrier, broken]), /layer failed/);

  assert.deepEqual(overlay.entries, [home]);
  assert.deepEqual(host.layers, ['home']);
  assert.deepEqual(host.visibleLayers(), ['home']);
  assert.equal(barrier.overlay, null);
  assert.equal(broken.overlay, null);
  overlay.insert(barrier);
  assert.deepEqual(host.layers, ['home', 'barrier']);
});

test('a route whose layers fail to build can be pushed again', () => {
  const host = createMemoryOverlayHost();
  const navigator = createNavigator({ host, onGenerateRoute: () => null });
  let failing = true;
  navigator.push(
    createOverlayRoute({
      settings: { name: 'home' },
      buildEntries: () => [entry('home')],
    })
  );
  const dialog = createOverlayRoute({
    settings: { name: 'dialog' },
    buildEntries: () => [
      entry('barrier', false),
      createOverlayEntry(() => {
        if (failing) throw new Error('layer failed');
        return 'panel';
      }),
    ],
  });

  assert.throws(() => navigator.push(dialog), /layer failed/);
  assert.deepEqual(host.layers, ['home']);
  assert.deepEqual(dialog.entries, []);
  assert.equal(dialog.navigator, null);
  assert.equal(navigator.history.length, 1);

  failing = false;
  navigator.push(dialog);
  assert.deepEqual(host.layers, ['home', 'barrier', 'panel']);
  assert.equal(dialog.entries.length, 2);
  assert.equal(navigator.current(), dialog);
});
