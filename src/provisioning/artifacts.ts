/**
 * postgis-lab - Lesson artifacts
 *
 * Files a lesson leaves in its workspace: copies of its SQL, a
 * postgresql.conf, a docker-compose.yml and the data directory mounted
 * into the container.
 */

import { copyFile, mkdir, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { stringify } from 'yaml';
import type { LessonArtifact, LessonDefinition } from '../types/index.js';
import { ValidationError } from '../types/index.js';
import { sqlPath } from '../lessons/sql.js';
import { logger } from '../utils/logger.js';

const log = logger.forModule('PROVISION');

const POSTGRES_CONF_SETTINGS: readonly [string, string][] = [
    ['listen_addresses', "'*'"],
    ['port', '5432'],
    ['max_connections', '100'],
    ['shared_buffers', '128MB'],
    ['work_mem', ''],
    ['maintenance_work_mem', '64MB'],
    ['wal_buffers', '16MB'],
    ['effective_cache_size', '512MB'],
    ['log_min_duration_statement', '100']
];

export function renderPostgresConf(workMem: string): string {
    const lines = POSTGRES_CONF_SETTINGS.map(([key, value]) =>
        `${key} = ${key === 'work_mem' ? workMem : value}`
    );
    return `${lines.join('\n')}\n`;
}

/** Compose paths are relative to the compose file and start with ./ */
function composeRelative(composeDir: string, target: string): string {
    const relative = path.posix.relative(path.posix.normalize(composeDir), path.posix.normalize(target));
    return relative.startsWith('.') ? relative : `./${relative}`;
}

/**
 * docker-compose.yml for a compose-mode lesson
 */
export function renderCompose(lesson: LessonDefinition): string {
    const { container, database } = lesson;
    if (container.mode !== 'compose' || container.service === undefined) {
        throw new ValidationError(`${lesson.id} is not a compose lesson`, { lessonId: lesson.id });
    }
    const composeDir = container.composeDir ?? '.';

    const service: Record<string, unknown> = {
        image: container.image,
        container_name: container.name,
        environment: {
            POSTGRES_DB: database.name,
            POSTGRES_USER: database.user,
            POSTGRES_PASSWORD: database.password
        },
        ports: [`${String(database.port)}:5432`]
    };

    if (container.volume) {
        service['volumes'] = [
            `${composeRelative(composeDir, container.volume.hostPath)}:${container.volume.containerPath}`
        ];
    }
    if (container.healthCheck) {
        const health = container.healthCheck;
        service['healthcheck'] = {
            test: ['CMD-SHELL', health.command],
            interval: `${String(health.intervalSeconds)}s`,
            timeout: `${String(health.timeoutSeconds)}s`,
            retries: health.retries
        };
    }
    if (container.restart !== undefined) {
        service['restart'] = container.restart;
    }

    return stringify({ version: '3.8', services: { [container.service]: service } });
}

function isPermissionError(error: unknown): boolean {
    return error instanceof Error && 'code' in error && (error.code === 'EACCES' || error.code === 'EPERM');
}

async function resetDataDir(target: string): Promise<void> {
    try {
        await rm(target, { recursive: true, force: true });
    } catch (error) {
        // Files written by the container user may not be removable from the host
        if (!isPermissionError(error)) {
            throw error;
        }
        log.warn(`Could not clear ${target}; keeping existing data`, {
            error: error instanceof Error ? error.message : String(error)
        });
    }
}

async function writeArtifact(lesson: LessonDefinition, workspace: string, artifact: LessonArtifact): Promise<void> {
    const target = path.join(workspace, artifact.path);

    switch (artifact.kind) {
        case 'sql':
            await mkdir(path.dirname(target), { recursive: true });
            await copyFile(sqlPath(lesson.id, artifact.source), target);
            break;
        case 'postgres-conf':
            await mkdir(path.dirname(target), { recursive: true });
            await writeFile(target, renderPostgresConf(artifact.workMem), 'utf8');
            break;
        case 'compose':
            await mkdir(path.dirname(target), { recursive: true });
            await writeFile(target, renderCompose(lesson), 'utf8');
            break;
        case 'data-dir':
            if (artifact.fresh) {
                await resetDataDir(target);
            }
            await mkdir(target, { recursive: true });
            break;
        case 'demo-output':
            // written by the demo
            return;
    }
    log.debug(`Wrote ${artifact.kind} ${artifact.path}`, { lessonId: lesson.id });
}

/**
 * Create the lesson workspace and everything it lists, in order
 */
export async function writeArtifacts(lesson: LessonDefinition, workspace: string): Promise<void> {
    await mkdir(workspace, { recursive: true });
    for (const artifact of lesson.artifacts) {
        await writeArtifact(lesson, workspace, artifact);
    }
}
