import { test } from 'node:test';
import assert from 'node:assert/strict';
import { JSDOM } from 'jsdom';

import { createDomOverlayHost } from '../src/overlay/dom-host.js';
import { createMemoryOverlayHost } from '../src/overlay/memory-host.js';
import { createNavigator } from '../src/navigator/navigator.js';
import { createPageRoute, createPopupRoute } from '../src/navigator/routes.js';
import { createLocalHistoryEntry } from '../src/navigator/capabilities/local-history.js';
import { namesOf, tick } from './helpers.js';

test('popup routes are translucent, dismissible and carry a local history', async () => {
  const host = createMemoryOverlayHost();
  const navigator = createNavigator({ host, onGenerateRoute: () => null });
  const home = createPageRoute({ settings: { name: 'home' }, buildPage: () => 'home' });
  const menu = createPopupRoute<string>({
    settings: { name: 'menu' },
    buildPage: () => 'menu',
    buildBarrier: () => 'scrim',
  });

  navigator.push(home);
  navigator.push(menu);
  await tick();

  assert.deepEqual(host.layers, ['home', 'scrim', 'menu']);
  assert.deepEqual(host.visibleLayers(), ['home', 'scrim', 'menu']);
  assert.equal(menu.modal?.barrierDismissible, true);
  assert.equal(menu.localHistory?.size, 0);

  assert.equal(home.modal?.dismiss(), false);
  assert.equal(menu.modal?.dismiss(), true);
  assert.deepEqual(namesOf(navigator.history), ['home']);
  assert.equal(await menu.popped, null);

  await tick();
  assert.equal(menu.disposed, true);
  assert.deepEqual(host.layers, ['home']);
});

test('page routes are opaque and ignore dismissal', async () => {
  const host = createMemoryOverlayHost();
  const navigator = createNavigator({ host, onGenerateRoute: () => null });
  navigator.push(createPageRoute({ settings: { name: 'home' }, buildPage: () => 'home' }));
  const settings = createPageRoute({
    settings: { name: 'settings' },
    buildPage: () => 'settings',
    buildBarrier: () => 'settings-barrier',
  });
  navigator.push(settings);
  await tick();

  assert.equal(settings.modal?.barrierDismissible, false);
  assert.equal(settings.modal?.dismiss(), false);
  assert.deepEqual(host.visibleLayers(), ['settings-barrier', 'settings']);
});

test('modal routes invalidate the navigator when their surroundings change', () => {
  const revisions: number[] = [];
  const navigator = createNavigator({
    host: createMemoryOverlayHost(),
    onGenerateRoute: () => null,
    onInvalidate: (source) => revisions.push(source.revision()),
  });
  const home = createPageRoute({ settings: { name: 'home' }, buildPage: () => 'home' });
  const editor = createPageRoute({ settings: { name: 'editor' }, buildPage: () => 'editor' });
  navigator.push(home);
  navigator.push(editor);

  navigator.replace(home, createPageRoute({ settings: { name: 'inbox' }, buildPage: () => 'inbox' }));
  assert.deepEqual(revisions, [1]);

  editor.localHistory?.add(createLocalHistoryEntry());
  assert.deepEqual(revisions, [1, 2]);
  assert.equal(navigator.revision(), 2);
});

test('tapping a dismissible barrier pops the popup', async () => {
  const { window } = new JSDOM('<!doctype html><html><body><main id="stage"></main></body></html>');
  const container = window.document.getElementById('stage');
  assert.ok(container);
  const navigator = createNavigator({ host: createDomOverlayHost(container), onGenerateRoute: () => null });
  const barriers: HTMLElement[] = [];

  navigator.push(
    createPageRoute({
      settings: { name: 'home' },
      buildPage: () => window.document.createElement('article'),
    })
  );
  const dialog = createPopupRoute({
    settings: { name: 'dialog' },
    buildPage: () => window.document.createElement('section'),
    buildBarrier: (_context, dismiss) => {
      const element = window.document.createElement('div');
      element.addEventListener('click', () => dismiss());
      barriers.push(element);
      return element;
    },
  });
  navigator.push(dialog);
  await tick();

  assert.deepEqual(
    Array.from(container.children, (child) => child.tagName),
    ['ARTICLE', 'DIV', 'SECTION']
  );
  assert.equal(barriers.length, 1);
  barriers[0].click();
  await tick();

  assert.equal(dialog.disposed, true);
  assert.deepEqual(
    Array.from(container.children, (child) => child.tagName),
    ['ARTICLE']
  );
  assert.equal(container.children[0].hasAttribute('hidden'), false);
});
