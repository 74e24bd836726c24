/**
 * postgis-lab - Queries shared by lesson routes
 */

import type { QueryExecutor } from '../types/index.js';
import { toInt } from '../utils/coerce.js';

/**
 * COUNT(*) of a public table, optionally filtered
 */
export async function countRows(executor: QueryExecutor, table: string, where?: string): Promise<number> {
    const sql = `SELECT COUNT(*) AS cnt FROM public.${table}${where ? ` WHERE ${where}` : ''}`;
    const result = await executor.execute(sql);
    return toInt(result.rows[0]?.['cnt']);
}

/**
 * Run `work` and measure its wall-clock duration
 */
export async function timed<T>(work: () => Promise<T>): Promise<{ value: T; executionTimeMs: number }> {
    const start = Date.now();
    const value = await work();
    return { value, executionTimeMs: Date.now() - start };
}
