/**
 * postgis-lab - Day 6 dashboard routes
 */

import type { QueryExecutor, RouteContext, RouteDefinition } from '../../types/index.js';
import { toInt } from '../../utils/coerce.js';
import { countRows, timed } from '../queries.js';
import { loadSql } from '../sql.js';

interface SensorCounts {
    regionsCount: number;
    sensorsCount: number;
    activeSensorsCount: number;
}

async function sensorCounts(executor: QueryExecutor): Promise<SensorCounts> {
    return {
        regionsCount: await countRows(executor, 'regions'),
        sensorsCount: await countRows(executor, 'sensors'),
        activeSensorsCount: await countRows(executor, 'sensors', "status = 'active'")
    };
}

export function createDay6Routes({ executor }: RouteContext): RouteDefinition[] {
    let lastDemo = { activeInRegionB: 0, executionTimeMs: 0 };

    return [
        {
            method: 'GET',
            path: '/stats',
            description: 'Region and sensor counts with the last CTE result',
            handler: async () => ({
                ...(await sensorCounts(executor)),
                activeInRegionB: lastDemo.activeInRegionB,
                lastDemoExecutionMs: lastDemo.executionTimeMs
            })
        },
        {
            method: 'POST',
            path: '/run-demo',
            description: 'Count active sensors in Region_B through a materialized CTE',
            handler: async () => {
                const query = await loadSql('day6', 'active_sensors_materialized.sql');
                const { value, executionTimeMs } = await timed(() => executor.execute(query));
                lastDemo = { activeInRegionB: toInt(value.rows[0]?.['cnt']), executionTimeMs };
                return {
                    ...(await sensorCounts(executor)),
                    ...lastDemo
                };
            }
        }
    ];
}
