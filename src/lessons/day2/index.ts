/**
 * postgis-lab - Day 2: work_mem and spatial aggregation
 */

import type { LessonDefinition, PsqlStep } from '../../types/index.js';
import type { ExplainOptions } from '../../utils/explain.js';
import { createDay2Routes, WORK_MEM_VALUES } from './routes.js';

const DEMO_EXPLAIN: ExplainOptions = { analyze: true, buffers: true, settings: true, verbose: true };

const showWorkMem: PsqlStep = { description: 'Current work_mem', command: 'SHOW work_mem;', echo: true };

export const day2: LessonDefinition = {
    id: 'day2',
    title: 'Day 2: work_mem tuning',
    summary: 'Region/place containment with ST_Union, planned at 4MB and again at 256MB work_mem.',
    workspaceDir: 'day2',
    database: { user: 'pguser', password: 'pgpassword', name: 'gis_warehouse', port: 5432 },
    container: {
        name: 'geospatial_pg17',
        image: 'postgis/postgis:17-3.5',
        mode: 'run',
        postgresArgs: ['-c', 'work_mem=4MB'],
        volume: { hostPath: 'pgdata', containerPath: '/var/lib/postgresql/data' }
    },
    artifacts: [
        { kind: 'data-dir', path: 'pgdata', fresh: true },
        { kind: 'postgres-conf', path: 'postgresql.conf', workMem: '4MB' },
        { kind: 'sql', source: 'init_data.sql', path: 'init_data.sql' }
    ],
    setup: [
        { description: 'Enable PostGIS', command: 'CREATE EXTENSION IF NOT EXISTS postgis;' },
        { description: 'Load places and regions', file: 'init_data.sql' }
    ],
    demo: {
        kind: 'psql',
        steps: [
            showWorkMem,
            { description: 'Containment join at baseline work_mem', file: 'demo_query.sql', explain: DEMO_EXPLAIN, echo: true },
            { description: 'Raise work_mem', command: "ALTER SYSTEM SET work_mem = '256MB';" },
            { description: 'Reload configuration', command: 'SELECT pg_reload_conf();' },
            showWorkMem,
            { description: 'Containment join at 256MB work_mem', file: 'demo_query.sql', explain: DEMO_EXPLAIN, echo: true }
        ]
    },
    checks: [
        { kind: 'row-count', table: 'places', expected: 10 },
        { kind: 'row-count', table: 'regions', expected: 3 }
    ],
    dashboard: {
        port: 3001,
        title: 'Memory Management Warehouse',
        subtitle: 'How work_mem changes the plan for a spatial join and union',
        statsPath: '/stats',
        metrics: [
            { key: 'workMem', label: 'work_mem' },
            { key: 'placesCount', label: 'Places' },
            { key: 'regionsCount', label: 'Regions' },
            { key: 'lastDemoExecutionMs', label: 'Last demo', unit: 'ms', decimals: 3 }
        ],
        actions: [
            { label: 'Run demo', path: '/run-demo' },
            {
                label: 'Set work_mem',
                path: '/set-work-mem',
                fields: [{ name: 'value', label: 'work_mem', type: 'select', options: WORK_MEM_VALUES }]
            },
            {
                label: 'Add place',
                path: '/add-place',
                fields: [
                    { name: 'name', label: 'Name', type: 'text', placeholder: 'Seattle' },
                    { name: 'lon', label: 'Longitude', type: 'number', placeholder: '-122.3321' },
                    { name: 'lat', label: 'Latitude', type: 'number', placeholder: '47.6062' }
                ]
            },
            { label: 'Reset data', path: '/reset-data' }
        ],
        lists: [
            {
                title: 'Last demo',
                path: '/stats',
                columns: ['region_name', 'num_places_in_region', 'aggregated_centroid']
            }
        ]
    },
    createRoutes: createDay2Routes
};
