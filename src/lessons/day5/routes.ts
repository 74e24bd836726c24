/**
 * postgis-lab - Day 5 dashboard routes
 */

import type { RouteContext, RouteDefinition } from '../../types/index.js';
import { countRows, timed } from '../queries.js';
import { SridService } from './srid.js';

export function createDay5Routes({ executor }: RouteContext): RouteDefinition[] {
    const srid = new SridService(executor);
    let lastDemo = { count4326: 0, count3857: 0, executionTimeMs: 0 };

    return [
        {
            method: 'GET',
            path: '/stats',
            description: 'Row counts of both SRID tables',
            handler: async () => ({
                count4326: await countRows(executor, 'locations_4326'),
                count3857: await countRows(executor, 'locations_3857'),
                lastDemoExecutionMs: lastDemo.executionTimeMs
            })
        },
        {
            method: 'POST',
            path: '/run-demo',
            description: 'Rebuild both tables with the three demo landmarks',
            handler: async () => {
                const { executionTimeMs } = await timed(() => srid.runDemo());
                lastDemo = {
                    count4326: await countRows(executor, 'locations_4326'),
                    count3857: await countRows(executor, 'locations_3857'),
                    executionTimeMs
                };
                return lastDemo;
            }
        }
    ];
}
