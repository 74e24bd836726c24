/**
 * postgis-lab - Day 6: materialized CTEs
 */

import type { LessonDefinition } from '../../types/index.js';
import type { ExplainOptions } from '../../utils/explain.js';
import { createDay6Routes } from './routes.js';

const DEMO_EXPLAIN: ExplainOptions = { analyze: true, verbose: true, buffers: true };

export const day6: LessonDefinition = {
    id: 'day6',
    title: 'Day 6: Materialized CTEs',
    summary: 'Active sensors inside Region_B, counted through an inlined CTE and through AS MATERIALIZED.',
    workspaceDir: 'day6',
    database: { user: 'postgres', password: 'mysecretpassword', name: 'geospatial_dw', port: 5432 },
    container: {
        name: 'pg_geospatial_day6',
        image: 'postgis/postgis:latest',
        mode: 'run',
        initialDatabase: false
    },
    artifacts: [],
    setup: [
        {
            description: 'Create geospatial_dw',
            command: 'CREATE DATABASE geospatial_dw;',
            database: 'postgres',
            ignoreErrors: true
        },
        { description: 'Create regions and sensors', file: 'schema.sql' },
        { description: 'Generate regions and 100000 sensors', file: 'data.sql' },
        { description: 'Build indexes', file: 'indexes.sql' }
    ],
    demo: {
        kind: 'psql',
        steps: [
            { description: 'Plain CTE', file: 'active_sensors_cte.sql', explain: DEMO_EXPLAIN, echo: true },
            { description: 'Materialized CTE', file: 'active_sensors_materialized.sql', explain: DEMO_EXPLAIN, echo: true }
        ]
    },
    checks: [
        { kind: 'row-count', table: 'regions', expected: 3 },
        { kind: 'row-count', table: 'sensors', expected: 100000 }
    ],
    dashboard: {
        port: 3006,
        title: 'Geospatial DW Day 6',
        subtitle: 'Materialized CTE: compute the region filter once, reuse it',
        statsPath: '/stats',
        metrics: [
            { key: 'regionsCount', label: 'Regions' },
            { key: 'sensorsCount', label: 'Sensors' },
            { key: 'activeSensorsCount', label: 'Active sensors' },
            { key: 'activeInRegionB', label: 'Active in Region_B' },
            { key: 'lastDemoExecutionMs', label: 'Last demo', unit: 'ms' }
        ],
        actions: [
            { label: 'Run demo', path: '/run-demo' }
        ],
        lists: []
    },
    createRoutes: createDay6Routes
};
