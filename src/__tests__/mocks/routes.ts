/**
 * postgis-lab - Route lookup for lesson route tests
 */

import type { RouteDefinition } from '../../types/index.js';

export function findRoute(routes: readonly RouteDefinition[], method: RouteDefinition['method'], path: string): RouteDefinition {
    const found = routes.find((candidate) => candidate.method === method && candidate.path === path);
    if (!found) {
        throw new Error(`No route ${method} ${path}`);
    }
    return found;
}
