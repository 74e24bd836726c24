/**
 * postgis-lab - Output recorder
 */

import type { Output } from '../../utils/output.js';

export class RecordingOutput implements Output {
    public lines: string[] = [];
    public tables: Record<string, unknown>[][] = [];

    line(text = ''): void {
        this.lines.push(text);
    }

    table(rows: readonly Record<string, unknown>[]): void {
        this.tables.push([...rows]);
    }

    /** Everything written with line(), joined */
    get text(): string {
        return this.lines.join('\n');
    }
}
