/**
 * postgis-lab - Lesson verification
 *
 * Checks that a provisioned lesson left what it promised: its files in the
 * workspace, a running container and the expected data.
 */

import { access } from 'node:fs/promises';
import path from 'node:path';
import type { DockerClient } from '../docker/index.js';
import type { LessonDefinition, LessonId } from '../types/index.js';
import { DockerError } from '../types/index.js';
import { logger } from '../utils/logger.js';

const log = logger.forModule('VERIFY');

export type CheckKind = 'artifact' | 'container' | 'data';

export interface CheckResult {
    name: string;
    kind: CheckKind;
    ok: boolean;
    detail: string;
}

export interface VerificationReport {
    lessonId: LessonId;
    checks: CheckResult[];
    failures: number;
}

async function exists(target: string): Promise<boolean> {
    try {
        await access(target);
        return true;
    } catch {
        return false;
    }
}

/**
 * psql scalar, with query failures read as '0'
 */
async function scalarOrZero(docker: DockerClient, lesson: LessonDefinition, sql: string): Promise<string> {
    try {
        return await docker.psqlScalar(lesson.container.name, {
            user: lesson.database.user,
            database: lesson.database.name
        }, sql);
    } catch (error) {
        if (!(error instanceof DockerError)) {
            throw error;
        }
        log.debug('Verification query failed', { lessonId: lesson.id, sql, error: error.message });
        return '0';
    }
}

export async function verifyLesson(
    lesson: LessonDefinition,
    docker: DockerClient,
    workspaceDir: string
): Promise<VerificationReport> {
    const checks: CheckResult[] = [];

    for (const artifact of lesson.artifacts) {
        const ok = await exists(path.join(workspaceDir, artifact.path));
        checks.push({ name: artifact.path, kind: 'artifact', ok, detail: ok ? 'present' : 'missing' });
    }

    const running = await docker.isRunning(lesson.container.name);
    checks.push({
        name: `container ${lesson.container.name}`,
        kind: 'container',
        ok: running,
        detail: running ? 'running' : 'not running'
    });

    for (const check of lesson.checks) {
        if (check.kind === 'row-count') {
            const value = await scalarOrZero(docker, lesson, `SELECT COUNT(*) FROM public.${check.table};`);
            const count = parseInt(value, 10);
            checks.push({
                name: `${check.table} row count`,
                kind: 'data',
                ok: count === check.expected,
                detail: `expected ${String(check.expected)}, found ${Number.isNaN(count) ? value : String(count)}`
            });
        } else {
            const value = await scalarOrZero(docker, lesson, check.sql);
            const number = parseFloat(value);
            checks.push({
                name: check.name,
                kind: 'data',
                ok: Number.isFinite(number) && number > 0,
                detail: value === '' ? 'no value' : value
            });
        }
    }

    const failures = checks.filter((check) => !check.ok).length;
    log.info(`Verified ${lesson.id}`, { lessonId: lesson.id, checks: checks.length, failures });
    return { lessonId: lesson.id, checks, failures };
}

function formatCheck(check: CheckResult): string {
    if (check.ok) {
        return `  OK ${check.name} (${check.detail})`;
    }
    if (check.kind === 'artifact') {
        return `  MISSING ${check.name}`;
    }
    return `  FAIL ${check.name} (${check.detail})`;
}

export function formatReport(report: VerificationReport): string[] {
    const lines = [`Verification for ${report.lessonId}:`, ...report.checks.map(formatCheck)];
    lines.push(report.failures === 0 ? 'All checks passed.' : `${String(report.failures)} check(s) failed.`);
    return lines;
}
