/**
 * postgis-lab - Day 5: SRID 4326 vs 3857
 */

import type { LessonDefinition } from '../../types/index.js';
import { createDay5Routes } from './routes.js';

const DATABASE = 'geospatial_db';

export const day5: LessonDefinition = {
    id: 'day5',
    title: 'Day 5: SRID 4326 vs 3857',
    summary: 'The same landmarks as WGS84 lon/lat and as Web Mercator metres, converted with ST_Transform.',
    workspaceDir: 'day5',
    database: { user: 'user', password: 'password', name: DATABASE, port: 5432 },
    container: {
        name: 'postgis_container',
        image: 'postgis/postgis:15-3.3',
        mode: 'compose',
        composeDir: 'docker',
        service: 'postgis',
        restart: 'unless-stopped',
        healthCheck: {
            command: `pg_isready -U user -d ${DATABASE}`,
            intervalSeconds: 5,
            timeoutSeconds: 5,
            retries: 5
        },
        volume: { hostPath: 'data/pgdata', containerPath: '/var/lib/postgresql/data' }
    },
    artifacts: [
        { kind: 'compose', path: 'docker/docker-compose.yml' },
        { kind: 'data-dir', path: 'data/pgdata', fresh: false }
    ],
    setup: [],
    demo: { kind: 'srid' },
    checks: [
        { kind: 'row-count', table: 'locations_4326', expected: 3 },
        { kind: 'row-count', table: 'locations_3857', expected: 3 }
    ],
    dashboard: {
        port: 3005,
        title: 'Master 4326 vs 3857',
        subtitle: 'Each landmark stored in both coordinate systems',
        statsPath: '/stats',
        metrics: [
            { key: 'count4326', label: 'Rows in locations_4326' },
            { key: 'count3857', label: 'Rows in locations_3857' },
            { key: 'lastDemoExecutionMs', label: 'Last demo', unit: 'ms' }
        ],
        actions: [
            { label: 'Run demo', path: '/run-demo' }
        ],
        lists: []
    },
    createRoutes: createDay5Routes
};
