export const DEFAULT_ROUTE_NAME = '/';

/**
 * Expands an initial route into the names to push, bottom first.
 *
 * A `/`-prefixed multi-segment name becomes a breadcrumb stack of cumulative
 * names, so a deep link lands with its parents underneath:
 *
 * ```ts
 * expandInitialRoute('/settings/profile'); // ['/', '/settings', '/settings/profile']
 * expandInitialRoute('home');              // ['home']
 * ```
 */
export function expandInitialRoute(initialRoute: string): string[] {
  if (!initialRoute.startsWith('/') || initialRoute.length === 1) return [initialRoute];

  const names = [DEFAULT_ROUTE_NAME];
  let name = '';
  for (const segment of initialRoute.slice(1).split('/')) {
    name += `/${segment}`;
    names.push(name);
  }
  return names;
}
