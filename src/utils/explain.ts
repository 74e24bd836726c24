/**
 * postgis-lab - EXPLAIN helpers
 *
 * Builds EXPLAIN statements for the lesson demos and reads the timing back
 * out of PostgreSQL's text plan.
 */

import type { Row } from '../types/index.js';

export interface ExplainOptions {
    analyze?: boolean;
    verbose?: boolean;
    buffers?: boolean;
    settings?: boolean;
    format?: 'text' | 'json';
}

/**
 * Prefix `sql` with EXPLAIN and its options, dropping a trailing semicolon
 */
export function buildExplainSql(sql: string, options: ExplainOptions = {}): string {
    const flags: string[] = [];
    if (options.analyze) flags.push('ANALYZE');
    if (options.verbose) flags.push('VERBOSE');
    if (options.buffers) flags.push('BUFFERS');
    if (options.settings) flags.push('SETTINGS');
    if (options.format) flags.push(`FORMAT ${options.format.toUpperCase()}`);

    const statement = sql.trim().replace(/;+\s*$/, '');
    return flags.length > 0
        ? `EXPLAIN (${flags.join(', ')}) ${statement}`
        : `EXPLAIN ${statement}`;
}

/**
 * Milliseconds from the `Execution Time: N ms` line, or 0 when absent
 */
export function parseExecutionTime(plan: string): number {
    const match = /Execution Time: ([\d.]+) ms/.exec(plan);
    if (!match?.[1]) {
        return 0;
    }
    const value = parseFloat(match[1]);
    return Number.isFinite(value) ? value : 0;
}

/**
 * Join the `QUERY PLAN` column of EXPLAIN output into one text block
 */
export function planText(rows: readonly Row[]): string {
    return rows
        .map((row) => row['QUERY PLAN'])
        .filter((line): line is string => typeof line === 'string')
        .join('\n');
}
