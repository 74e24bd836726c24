/**
 * postgis-lab - Day 3: GIST index and buffer search
 */

import type { LessonDefinition } from '../../types/index.js';
import { createDay3Routes } from './routes.js';

const DATABASE = 'geospatial_warehouse_day3';

export const day3: LessonDefinition = {
    id: 'day3',
    title: 'Day 3: Spatial indexing',
    summary: '5000 points around San Francisco; a 500 m buffer search served by a GIST index.',
    workspaceDir: 'day3',
    database: { user: 'user', password: 'password', name: DATABASE, port: 5432 },
    container: {
        name: 'postgis_day3_db',
        image: 'postgis/postgis:16-3.4',
        mode: 'compose',
        composeDir: '.',
        service: 'postgis',
        restart: 'unless-stopped',
        healthCheck: {
            command: `pg_isready -U user -d ${DATABASE}`,
            intervalSeconds: 5,
            timeoutSeconds: 5,
            retries: 5
        }
    },
    artifacts: [
        { kind: 'compose', path: 'docker-compose.yml' },
        { kind: 'demo-output', path: 'explain_analyze_output.txt' }
    ],
    setup: [
        { description: 'Create locations table', file: 'schema.sql' },
        { description: 'Generate 5000 locations', file: 'seed_locations.sql' },
        { description: 'Build GIST index', file: 'index.sql' }
    ],
    demo: {
        kind: 'psql',
        steps: [
            {
                description: 'Buffer search plan',
                file: 'buffer_query.sql',
                explain: { analyze: true, buffers: true },
                echo: true,
                saveAs: 'explain_analyze_output.txt'
            }
        ]
    },
    checks: [
        { kind: 'row-count', table: 'locations', expected: 5000 }
    ],
    dashboard: {
        port: 3002,
        title: 'Geospatial Warehouse Day 3',
        subtitle: 'ST_Intersects against a 500 m buffer, with and without the planner reaching for GIST',
        statsPath: '/stats',
        metrics: [
            { key: 'locationsCount', label: 'Locations' },
            { key: 'pointsInBuffer', label: 'Points in buffer' },
            { key: 'indexName', label: 'Spatial index' },
            { key: 'lastDemoExecutionMs', label: 'Last demo', unit: 'ms', decimals: 3 }
        ],
        actions: [
            { label: 'Run demo', path: '/run-demo' }
        ],
        lists: [
            { title: 'Points in buffer', path: '/stats', columns: ['id', 'name', 'geom_text'] }
        ]
    },
    createRoutes: createDay3Routes
};
