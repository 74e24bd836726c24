/**
 * Day 2 route tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { MockExecutor, findRoute } from '../../__tests__/mocks/index.js';
import { createDay2Routes } from '../day2/routes.js';
import { ValidationError } from '../../types/index.js';
import type { RouteDefinition } from '../../types/index.js';

vi.mock('../../utils/logger.js', () => {
    const moduleLogger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    return { logger: { forModule: () => moduleLogger } };
});

describe('day2 routes', () => {
    let executor: MockExecutor;
    let routes: RouteDefinition[];

    const call = (method: RouteDefinition['method'], path: string, body: unknown = {}): Promise<unknown> =>
        findRoute(routes, method, path).handler(body);

    beforeEach(() => {
        executor = new MockExecutor();
        routes = createDay2Routes({ executor });
        executor
            .respondTo('SHOW work_mem', [{ work_mem: '4MB' }])
            .respondTo('FROM public.places', [{ cnt: '10' }])
            .respondTo('FROM public.regions', [{ cnt: '3' }]);
    });

    describe('stats', () => {
        it('should report the server work_mem before anything is set', async () => {
            await expect(call('GET', '/stats')).resolves.toEqual({
                workMem: '4MB',
                placesCount: 10,
                regionsCount: 3,
                lastDemoExecutionMs: 0,
                demoResults: []
            });
        });

        it('should show a dash when work_mem cannot be read', async () => {
            const bare = new MockExecutor();
            const body = await findRoute(createDay2Routes({ executor: bare }), 'GET', '/stats').handler(undefined);

            expect(body).toMatchObject({ workMem: '—', placesCount: 0, regionsCount: 0 });
        });
    });

    describe('run-demo', () => {
        beforeEach(() => {
            executor
                .respondTo(/^EXPLAIN/, [
                    { 'QUERY PLAN': 'Sort  (cost=1.10..1.11 rows=3 width=72)' },
                    { 'QUERY PLAN': 'Planning Time: 0.412 ms' },
                    { 'QUERY PLAN': 'Execution Time: 2.731 ms' }
                ])
                .respondTo('ST_Union', [
                    { region_name: 'East Coast', num_places_in_region: '4', aggregated_centroid: 'POINT(-76.1 39.9)' },
                    { region_name: 'West Coast', num_places_in_region: '3', aggregated_centroid: null }
                ]);
        });

        it('should time the query with EXPLAIN ANALYZE and return its rows', async () => {
            const body = await call('POST', '/run-demo');

            expect(body).toEqual({
                executionTimeMs: 2.731,
                rows: [
                    { region_name: 'East Coast', num_places_in_region: 4, aggregated_centroid: 'POINT(-76.1 39.9)' },
                    { region_name: 'West Coast', num_places_in_region: 3, aggregated_centroid: null }
                ]
            });
            expect(executor.statements[0]).toMatch(/^EXPLAIN \(ANALYZE, BUFFERS, FORMAT TEXT\) /);
        });

        it('should keep the result for stats', async () => {
            await call('POST', '/run-demo');

            const stats = await call('GET', '/stats');

            expect(stats).toMatchObject({ lastDemoExecutionMs: 2.731 });
            expect(stats).toHaveProperty('demoResults.length', 2);
        });
    });

    describe('set-work-mem', () => {
        it('should alter the system setting, reload and recycle the pool', async () => {
            const body = await call('POST', '/set-work-mem', { value: '64MB' });

            expect(body).toEqual({ ok: true, workMem: '64MB', message: 'work_mem set to 64MB; metric updated.' });
            expect(executor.statements).toEqual([
                "ALTER SYSTEM SET work_mem = '64MB'",
                'SELECT pg_reload_conf()'
            ]);
            expect(executor.recycles).toBe(1);
        });

        it('should default to 256MB', async () => {
            await expect(call('POST', '/set-work-mem', {})).resolves.toMatchObject({ workMem: '256MB' });
        });

        it('should report the value set here in stats', async () => {
            await call('POST', '/set-work-mem', { value: '16MB' });

            await expect(call('GET', '/stats')).resolves.toMatchObject({ workMem: '16MB' });
        });

        it('should reject values outside the allowed list', async () => {
            const promise = call('POST', '/set-work-mem', { value: "1GB'; DROP TABLE places; --" });

            await expect(promise).rejects.toBeInstanceOf(ValidationError);
            await expect(promise).rejects.toThrow(
                'Invalid work_mem; use one of: 4MB, 8MB, 16MB, 32MB, 64MB, 128MB, 256MB'
            );
            expect(executor.executedQueries).toHaveLength(0);
        });
    });

    describe('add-place', () => {
        it('should insert Seattle by default and return the new count', async () => {
            const body = await call('POST', '/add-place');

            expect(executor.executedQueries[0]?.params).toEqual(['Seattle', -122.3321, 47.6062]);
            expect(body).toEqual({
                ok: true,
                placesCount: 10,
                message: 'Added "Seattle"; Places count is now 10.'
            });
        });

        it('should use the posted name and coordinates', async () => {
            await call('POST', '/add-place', { name: 'Denver', lon: '-104.9903', lat: '39.7392' });

            expect(executor.executedQueries[0]?.params).toEqual(['Denver', -104.9903, 39.7392]);
        });
    });

    it('should reload init_data.sql and clear the last demo on reset', async () => {
        executor.respondTo(/^EXPLAIN/, [{ 'QUERY PLAN': 'Execution Time: 5.5 ms' }]);
        await call('POST', '/run-demo');

        const body = await call('POST', '/reset-data');

        expect(body).toEqual({
            ok: true,
            message: 'Data reset to 10 places, 3 regions. Run the demo again to see execution time.'
        });
        expect(executor.statements.at(-1)).toContain('CREATE TABLE public.places');
        await expect(call('GET', '/stats')).resolves.toMatchObject({ lastDemoExecutionMs: 0, demoResults: [] });
    });
});
