/**
 * postgis-lab - User-facing output
 *
 * Results for the learner (psql output, reports, tables) go to stdout;
 * diagnostics go through the logger on stderr.
 */

export interface Output {
    line(text?: string): void;
    table(rows: readonly Record<string, unknown>[]): void;
}

export const consoleOutput: Output = {
    line: (text = '') => {
        console.log(text);
    },
    table: (rows) => {
        console.table(rows);
    }
};
