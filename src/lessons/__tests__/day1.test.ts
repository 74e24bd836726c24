/**
 * Day 1 route tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ZodError } from 'zod';
import { MockExecutor, findRoute as route } from '../../__tests__/mocks/index.js';
import { createDay1Routes } from '../day1/routes.js';
import type { RouteDefinition } from '../../types/index.js';

describe('day1 routes', () => {
    let executor: MockExecutor;
    let routes: RouteDefinition[];

    beforeEach(() => {
        executor = new MockExecutor();
        routes = createDay1Routes({ executor });
    });

    it('should expose the dashboard endpoints', () => {
        expect(routes.map((r) => `${r.method} ${r.path}`)).toEqual([
            'GET /locations',
            'GET /distances',
            'GET /stats',
            'POST /refresh',
            'POST /add-location',
            'POST /reset-locations'
        ]);
    });

    it('should return locations with numeric coordinates', async () => {
        executor.respondTo('ORDER BY id', [
            { id: 1, name: 'San Francisco Ferry Building', lon: -122.3934, lat: 37.7955 },
            { id: 2, name: 'New York Times Square', lon: '-73.9855', lat: '40.758' }
        ]);

        const body = await route(routes, 'GET', '/locations').handler(undefined);

        expect(body).toEqual([
            { id: 1, name: 'San Francisco Ferry Building', lon: -122.3934, lat: 37.7955 },
            { id: 2, name: 'New York Times Square', lon: -73.9855, lat: 40.758 }
        ]);
    });

    it('should label spherical distances', async () => {
        executor.respondTo('UNION ALL', [
            { label: 'SF to NY (Spherical)', meters: 4139331.5 },
            { label: 'London to Paris (Spherical)', meters: 341581.2 }
        ]);

        const body = await route(routes, 'GET', '/distances').handler(undefined);

        expect(body).toEqual([
            { label: 'SF to NY (Spherical)', meters: 4139331.5 },
            { label: 'London to Paris (Spherical)', meters: 341581.2 }
        ]);
    });

    it('should combine the count and both distances in stats', async () => {
        executor
            .respondTo('COUNT(*) AS total', [{ total: '4' }])
            .respondTo("name = 'New York Times Square'", [{ meters: '4139331.5' }])
            .respondTo("name = 'Eiffel Tower, Paris'", [{ meters: 341581.2 }]);

        const body = await route(routes, 'GET', '/stats').handler(undefined);

        expect(body).toEqual({ totalLocations: 4, sfNyMeters: 4139331.5, londonParisMeters: 341581.2 });
    });

    it('should answer refresh without touching the database', async () => {
        const body = await route(routes, 'POST', '/refresh').handler({});

        expect(body).toEqual({ ok: true, message: 'Use GET /api/stats and /api/locations to refresh.' });
        expect(executor.executedQueries).toHaveLength(0);
    });

    describe('add-location', () => {
        it('should default to Tokyo Tower', async () => {
            const body = await route(routes, 'POST', '/add-location').handler({});

            expect(body).toEqual({ ok: true, message: 'Added location: Tokyo Tower' });
            expect(executor.executedQueries[0]?.params).toEqual(['Tokyo Tower', 139.7454, 35.6586]);
        });

        it('should insert the posted point into all three columns', async () => {
            await route(routes, 'POST', '/add-location').handler({ name: 'Sydney Opera House', lon: '151.2153', lat: -33.8568 });

            const insert = executor.executedQueries[0];
            expect(insert?.params).toEqual(['Sydney Opera House', 151.2153, -33.8568]);
            expect(insert?.sql).toContain('ST_Transform(ST_SetSRID(ST_MakePoint($2, $3), 4326), 3857)');
            expect(insert?.sql).toContain('::GEOGRAPHY');
        });

        it('should fall back to default coordinates for zero or unparseable values', async () => {
            await route(routes, 'POST', '/add-location').handler({ name: 'Null Island', lon: 0, lat: 'north' });

            expect(executor.executedQueries[0]?.params).toEqual(['Null Island', 139.7454, 35.6586]);
        });

        it('should reject a non-string name', async () => {
            await expect(route(routes, 'POST', '/add-location').handler({ name: 42 })).rejects.toBeInstanceOf(ZodError);
        });
    });

    it('should reset to the original four locations in one transaction', async () => {
        const body = await route(routes, 'POST', '/reset-locations').handler({});

        expect(body).toEqual({ ok: true, message: 'Reset to original 4 locations.' });
        expect(executor.transactions).toBe(1);
        expect(executor.statements).toEqual([
            'DELETE FROM locations WHERE id > 4',
            "SELECT setval(pg_get_serial_sequence('locations', 'id'), 4)"
        ]);
    });
});
