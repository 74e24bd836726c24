/**
 * postgis-lab - Day 2 dashboard routes
 *
 * The containment demo under EXPLAIN ANALYZE, and a work_mem switch that
 * goes through ALTER SYSTEM so every new session sees it.
 */

import type { RouteContext, RouteDefinition } from '../../types/index.js';
import { ValidationError } from '../../types/index.js';
import { buildExplainSql, parseExecutionTime, planText } from '../../utils/explain.js';
import { coordinateOr, textOr, toInt } from '../../utils/coerce.js';
import { logger } from '../../utils/logger.js';
import { countRows } from '../queries.js';
import { loadSql } from '../sql.js';
import { PointBodySchema, WorkMemBodySchema } from '../schemas.js';

const log = logger.forModule('LESSON');

export const WORK_MEM_VALUES = ['4MB', '8MB', '16MB', '32MB', '64MB', '128MB', '256MB'] as const;

const DEFAULT_PLACE = { name: 'Seattle', lon: -122.3321, lat: 47.6062 };

interface RegionRow {
    region_name: string;
    num_places_in_region: number;
    aggregated_centroid: string | null;
}

interface DemoResult {
    executionTimeMs: number;
    rows: RegionRow[];
}

function isWorkMem(value: string): value is (typeof WORK_MEM_VALUES)[number] {
    return WORK_MEM_VALUES.some((allowed) => allowed === value);
}

export function createDay2Routes({ executor }: RouteContext): RouteDefinition[] {
    let lastWorkMem: string | null = null;
    let lastDemo: DemoResult = { executionTimeMs: 0, rows: [] };

    return [
        {
            method: 'GET',
            path: '/stats',
            description: 'work_mem, table counts and the last demo run',
            handler: async () => {
                const shown = await executor.execute('SHOW work_mem');
                const dbWorkMem = shown.rows[0]?.['work_mem'];
                return {
                    workMem: lastWorkMem ?? (typeof dbWorkMem === 'string' && dbWorkMem !== '' ? dbWorkMem : '—'),
                    placesCount: await countRows(executor, 'places'),
                    regionsCount: await countRows(executor, 'regions'),
                    lastDemoExecutionMs: lastDemo.executionTimeMs,
                    demoResults: lastDemo.rows
                };
            }
        },
        {
            method: 'POST',
            path: '/run-demo',
            description: 'Time the region containment query with EXPLAIN ANALYZE',
            handler: async () => {
                const query = await loadSql('day2', 'demo_query.sql');
                const plan = await executor.execute(buildExplainSql(query, { analyze: true, buffers: true, format: 'text' }));
                const executionTimeMs = parseExecutionTime(planText(plan.rows));

                const result = await executor.execute(query);
                const rows = result.rows.map((row): RegionRow => ({
                    region_name: String(row['region_name']),
                    num_places_in_region: toInt(row['num_places_in_region']),
                    aggregated_centroid: typeof row['aggregated_centroid'] === 'string' ? row['aggregated_centroid'] : null
                }));

                lastDemo = { executionTimeMs, rows };
                return lastDemo;
            }
        },
        {
            method: 'POST',
            path: '/set-work-mem',
            description: 'ALTER SYSTEM SET work_mem and reload',
            handler: async (body) => {
                const value = textOr(WorkMemBodySchema.parse(body).value, '256MB');
                if (!isWorkMem(value)) {
                    throw new ValidationError(`Invalid work_mem; use one of: ${WORK_MEM_VALUES.join(', ')}`, { value });
                }
                // ALTER SYSTEM cannot take a bind parameter; value is one of WORK_MEM_VALUES
                await executor.execute(`ALTER SYSTEM SET work_mem = '${value}'`);
                await executor.execute('SELECT pg_reload_conf()');
                // Pooled sessions keep the old setting
                await executor.recycle();
                lastWorkMem = value;
                log.info(`work_mem set to ${value}`);
                return { ok: true, workMem: value, message: `work_mem set to ${value}; metric updated.` };
            }
        },
        {
            method: 'POST',
            path: '/add-place',
            description: 'Insert a place (defaults to Seattle)',
            handler: async (body) => {
                const input = PointBodySchema.parse(body);
                const name = textOr(input.name, DEFAULT_PLACE.name);
                const lon = coordinateOr(input.lon, DEFAULT_PLACE.lon);
                const lat = coordinateOr(input.lat, DEFAULT_PLACE.lat);
                await executor.execute(
                    "INSERT INTO public.places (name, category, geom) VALUES ($1, 'City', ST_SetSRID(ST_MakePoint($2, $3), 4326))",
                    [name, lon, lat]
                );
                const placesCount = await countRows(executor, 'places');
                return {
                    ok: true,
                    placesCount,
                    message: `Added "${name}"; Places count is now ${String(placesCount)}.`
                };
            }
        },
        {
            method: 'POST',
            path: '/reset-data',
            description: 'Rebuild places and regions and clear the last demo',
            handler: async () => {
                await executor.execute(await loadSql('day2', 'init_data.sql'));
                lastDemo = { executionTimeMs: 0, rows: [] };
                return { ok: true, message: 'Data reset to 10 places, 3 regions. Run the demo again to see execution time.' };
            }
        }
    ];
}
