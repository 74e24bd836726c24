/**
 * postgis-lab - Day 1: GEOMETRY vs GEOGRAPHY storage
 */

import type { LessonDefinition } from '../../types/index.js';
import { createDay1Routes } from './routes.js';

const DATABASE = 'geospatial_warehouse_geospatial_day1';

export const day1: LessonDefinition = {
    id: 'day1',
    title: 'Day 1: Spatial data types',
    summary: 'One point stored as 3857 geometry, 4326 geometry and 4326 geography; planar vs spherical distance.',
    workspaceDir: 'day1',
    database: { user: 'user', password: 'password', name: DATABASE, port: 5432 },
    container: {
        name: 'postgis_geospatial_day1_container',
        image: 'postgis/postgis:16-3.4',
        mode: 'run',
        healthCheck: {
            command: `pg_isready -U user -d ${DATABASE}`,
            intervalSeconds: 5,
            timeoutSeconds: 5,
            retries: 5
        }
    },
    artifacts: [
        { kind: 'sql', source: 'setup_db.sql', path: 'sql/setup_db.sql' },
        { kind: 'sql', source: 'insert_data.sql', path: 'sql/insert_data.sql' },
        { kind: 'sql', source: 'query_data.sql', path: 'sql/query_data.sql' }
    ],
    setup: [
        { description: 'Create locations table and indexes', file: 'setup_db.sql' },
        { description: 'Insert sample locations', file: 'insert_data.sql' }
    ],
    demo: {
        kind: 'psql',
        steps: [
            {
                description: 'Compare planar and spherical distances',
                file: 'query_data.sql',
                flags: ['-P', 'pager=off', '-P', 'footer=off', '-x'],
                echo: true
            }
        ]
    },
    checks: [
        { kind: 'row-count', table: 'locations', expected: 4 },
        {
            kind: 'positive-number',
            name: 'SF to NY geography distance',
            sql: "SELECT ST_Distance((SELECT geog_global FROM locations WHERE name = 'San Francisco Ferry Building'), "
                + "(SELECT geog_global FROM locations WHERE name = 'New York Times Square'));"
        }
    ],
    dashboard: {
        port: 3000,
        title: 'Geospatial Day 1',
        subtitle: 'GEOMETRY vs GEOGRAPHY: the same points, three storage types',
        statsPath: '/stats',
        metrics: [
            { key: 'totalLocations', label: 'Locations' },
            { key: 'sfNyMeters', label: 'SF to NY', unit: 'm', decimals: 0 },
            { key: 'londonParisMeters', label: 'London to Paris', unit: 'm', decimals: 0 }
        ],
        actions: [
            { label: 'Refresh', path: '/refresh' },
            {
                label: 'Add location',
                path: '/add-location',
                fields: [
                    { name: 'name', label: 'Name', type: 'text', placeholder: 'Tokyo Tower' },
                    { name: 'lon', label: 'Longitude', type: 'number', placeholder: '139.7454' },
                    { name: 'lat', label: 'Latitude', type: 'number', placeholder: '35.6586' }
                ]
            },
            { label: 'Reset locations', path: '/reset-locations' }
        ],
        lists: [
            { title: 'Locations', path: '/locations', columns: ['id', 'name', 'lon', 'lat'] },
            { title: 'Distances', path: '/distances', columns: ['label', 'meters'] }
        ]
    },
    createRoutes: createDay1Routes
};
