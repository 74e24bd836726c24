/**
 * Day 4 route tests
 */

import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { MockExecutor, findRoute } from '../../__tests__/mocks/index.js';
import { createDay4Routes } from '../day4/routes.js';
import type { RouteDefinition } from '../../types/index.js';

describe('day4 routes', () => {
    let executor: MockExecutor;
    let routes: RouteDefinition[];

    beforeEach(() => {
        executor = new MockExecutor();
        routes = createDay4Routes({ executor });
        executor
            .respondTo('FROM public.landmarks', [{ cnt: '3' }])
            .respondTo('ST_Distance', (_sql, params) =>
                params?.[1] === 'Arc de Triomphe'
                    ? [{ d_geom: '2616.4', d_geog: '1718.9' }]
                    : [{ d_geom: '8990123.7', d_geog: 'NaN' }]
            );
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should report zero distances before the demo runs', async () => {
        await expect(findRoute(routes, 'GET', '/stats').handler(undefined)).resolves.toEqual({
            landmarksCount: 3,
            localDistGeometry: 0,
            localDistGeography: 0,
            globalDistGeometry: 0,
            globalDistGeography: 0,
            lastDemoExecutionMs: 0
        });
    });

    it('should measure both pairs and time the run', async () => {
        vi.spyOn(Date, 'now').mockReturnValueOnce(1000).mockReturnValueOnce(1042);

        const body = await findRoute(routes, 'POST', '/run-demo').handler({});

        expect(body).toEqual({
            landmarksCount: 3,
            localDistGeometry: 2616.4,
            localDistGeography: 1718.9,
            globalDistGeometry: 8990123.7,
            globalDistGeography: 0,
            executionTimeMs: 42
        });
        expect(executor.executedQueries[0]?.params).toEqual(['Eiffel Tower', 'Arc de Triomphe']);
        expect(executor.executedQueries[1]?.params).toEqual(['Eiffel Tower', 'Statue of Liberty']);
    });

    it('should serve the last run from stats', async () => {
        await findRoute(routes, 'POST', '/run-demo').handler({});

        await expect(findRoute(routes, 'GET', '/stats').handler(undefined))
            .resolves.toMatchObject({ localDistGeography: 1718.9, globalDistGeometry: 8990123.7 });
    });
});
