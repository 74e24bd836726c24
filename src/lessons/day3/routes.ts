/**
 * postgis-lab - Day 3 dashboard routes
 */

import type { RouteContext, RouteDefinition } from '../../types/index.js';
import { buildExplainSql, parseExecutionTime, planText } from '../../utils/explain.js';
import { toInt } from '../../utils/coerce.js';
import { countRows } from '../queries.js';
import { loadSql } from '../sql.js';

export const INDEX_NAME = 'idx_locations_geom';

interface BufferRow {
    id: number;
    name: string;
    geom_text: string;
}

export function createDay3Routes({ executor }: RouteContext): RouteDefinition[] {
    let lastDemo: { executionTimeMs: number; rows: BufferRow[] } = { executionTimeMs: 0, rows: [] };

    return [
        {
            method: 'GET',
            path: '/stats',
            description: 'Location count, index name and the last buffer search',
            handler: async () => {
                const locationsCount = await countRows(executor, 'locations');
                const index = await executor.execute(
                    `SELECT indexname FROM pg_indexes WHERE tablename = 'locations' AND indexname = '${INDEX_NAME}'`
                );
                const indexName = index.rows[0]?.['indexname'];
                return {
                    locationsCount,
                    pointsInBuffer: lastDemo.rows.length,
                    indexName: typeof indexName === 'string' ? indexName : INDEX_NAME,
                    lastDemoExecutionMs: lastDemo.executionTimeMs,
                    demoResults: lastDemo.rows
                };
            }
        },
        {
            method: 'POST',
            path: '/run-demo',
            description: 'Points inside a 500 m buffer, timed with EXPLAIN ANALYZE',
            handler: async () => {
                const query = await loadSql('day3', 'buffer_query.sql');
                const plan = await executor.execute(buildExplainSql(query, { analyze: true, format: 'text' }));
                const executionTimeMs = parseExecutionTime(planText(plan.rows));

                const result = await executor.execute(query);
                const rows = result.rows.map((row): BufferRow => ({
                    id: toInt(row['id']),
                    name: String(row['name']),
                    geom_text: String(row['geom_text'])
                }));

                lastDemo = { executionTimeMs, rows };
                return lastDemo;
            }
        }
    ];
}
