/**
 * postgis-lab - Day 4: GEOMETRY (3857) vs GEOGRAPHY (4326) distances
 */

import type { LessonDefinition } from '../../types/index.js';
import { createDay4Routes } from './routes.js';

export const day4: LessonDefinition = {
    id: 'day4',
    title: 'Day 4: GEOMETRY vs GEOGRAPHY',
    summary: 'Web Mercator distances drift from true distance as the points move apart; geography does not.',
    workspaceDir: 'day4',
    database: { user: 'admin', password: 'password', name: 'geospatial_warehouse', port: 5432 },
    container: {
        name: 'postgis_geodebate_db',
        image: 'postgis/postgis:16-3.4',
        mode: 'run'
    },
    artifacts: [
        { kind: 'sql', source: 'landmarks.sql', path: 'sql/landmarks.sql' },
        { kind: 'sql', source: 'local_distance.sql', path: 'sql/local_distance.sql' },
        { kind: 'sql', source: 'global_distance.sql', path: 'sql/global_distance.sql' },
        { kind: 'sql', source: 'verify_landmarks.sql', path: 'sql/verify_landmarks.sql' }
    ],
    setup: [
        { description: 'Enable PostGIS', command: 'CREATE EXTENSION IF NOT EXISTS postgis;' },
        { description: 'Load landmarks', file: 'landmarks.sql' }
    ],
    demo: {
        kind: 'psql',
        steps: [
            { description: 'Local distance: Eiffel Tower to Arc de Triomphe', file: 'local_distance.sql', echo: true },
            { description: 'Global distance: Eiffel Tower to Statue of Liberty', file: 'global_distance.sql', echo: true },
            { description: 'Stored landmarks', file: 'verify_landmarks.sql', echo: true }
        ]
    },
    checks: [
        { kind: 'row-count', table: 'landmarks', expected: 3 }
    ],
    dashboard: {
        port: 3004,
        title: 'Geometry vs Geography',
        subtitle: 'Planar 3857 metres against spheroidal 4326 metres, near and far',
        statsPath: '/stats',
        metrics: [
            { key: 'landmarksCount', label: 'Landmarks' },
            { key: 'localDistGeometry', label: 'Local (geometry 3857)', unit: 'm', decimals: 1 },
            { key: 'localDistGeography', label: 'Local (geography 4326)', unit: 'm', decimals: 1 },
            { key: 'globalDistGeometry', label: 'Global (geometry 3857)', unit: 'm', decimals: 0 },
            { key: 'globalDistGeography', label: 'Global (geography 4326)', unit: 'm', decimals: 0 },
            { key: 'lastDemoExecutionMs', label: 'Last demo', unit: 'ms' }
        ],
        actions: [
            { label: 'Run demo', path: '/run-demo' }
        ],
        lists: []
    },
    createRoutes: createDay4Routes
};
