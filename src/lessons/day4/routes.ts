/**
 * postgis-lab - Day 4 dashboard routes
 *
 * Local and global distances measured as 3857 geometry and as 4326 geography.
 */

import type { QueryExecutor, RouteContext, RouteDefinition } from '../../types/index.js';
import { toFloat } from '../../utils/coerce.js';
import { countRows, timed } from '../queries.js';

interface DistanceDemo {
    landmarksCount: number;
    localDistGeometry: number;
    localDistGeography: number;
    globalDistGeometry: number;
    globalDistGeography: number;
    executionTimeMs: number;
}

const EMPTY_DEMO: DistanceDemo = {
    landmarksCount: 0,
    localDistGeometry: 0,
    localDistGeography: 0,
    globalDistGeometry: 0,
    globalDistGeography: 0,
    executionTimeMs: 0
};

async function pairDistances(executor: QueryExecutor, from: string, to: string): Promise<{ geometry: number; geography: number }> {
    const result = await executor.execute(
        `SELECT ST_Distance(t1.geom_3857, t2.geom_3857) AS d_geom,
                ST_Distance(t1.geog_4326, t2.geog_4326) AS d_geog
         FROM landmarks t1, landmarks t2
         WHERE t1.name = $1 AND t2.name = $2`,
        [from, to]
    );
    const row = result.rows[0];
    return {
        geometry: toFloat(row?.['d_geom']) ?? 0,
        geography: toFloat(row?.['d_geog']) ?? 0
    };
}

export function createDay4Routes({ executor }: RouteContext): RouteDefinition[] {
    let lastDemo: DistanceDemo = { ...EMPTY_DEMO };

    return [
        {
            method: 'GET',
            path: '/stats',
            description: 'Landmark count and the last measured distances',
            handler: async () => ({
                landmarksCount: await countRows(executor, 'landmarks'),
                localDistGeometry: lastDemo.localDistGeometry,
                localDistGeography: lastDemo.localDistGeography,
                globalDistGeometry: lastDemo.globalDistGeometry,
                globalDistGeography: lastDemo.globalDistGeography,
                lastDemoExecutionMs: lastDemo.executionTimeMs
            })
        },
        {
            method: 'POST',
            path: '/run-demo',
            description: 'Measure Eiffel-Arc and Eiffel-Liberty both ways',
            handler: async () => {
                const { value, executionTimeMs } = await timed(async () => ({
                    local: await pairDistances(executor, 'Eiffel Tower', 'Arc de Triomphe'),
                    global: await pairDistances(executor, 'Eiffel Tower', 'Statue of Liberty'),
                    landmarksCount: await countRows(executor, 'landmarks')
                }));
                lastDemo = {
                    landmarksCount: value.landmarksCount,
                    localDistGeometry: value.local.geometry,
                    localDistGeography: value.local.geography,
                    globalDistGeometry: value.global.geometry,
                    globalDistGeography: value.global.geography,
                    executionTimeMs
                };
                return lastDemo;
            }
        }
    ];
}
