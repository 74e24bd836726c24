/**
 * postgis-lab - Lesson provisioning
 *
 * Drives a lesson from nothing to a running, seeded container: artifacts,
 * container, setup SQL, demo, verification and finally the dashboard.
 */

import { access, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { DockerClient, PsqlConnection } from '../docker/index.js';
import type { LessonDefinition, PooledExecutor, PsqlStep } from '../types/index.js';
import { DockerError, DockerNotInstalledError, ProvisioningError } from '../types/index.js';
import { loadSql } from '../lessons/sql.js';
import { SridService } from '../lessons/day5/srid.js';
import { printSridDemo } from '../lessons/day5/format.js';
import { buildExplainSql } from '../utils/explain.js';
import { logger } from '../utils/logger.js';
import type { Output } from '../utils/output.js';
import { consoleOutput } from '../utils/output.js';
import { formatReport, verifyLesson } from '../verification/verify.js';
import type { VerificationReport } from '../verification/verify.js';
import { writeArtifacts } from './artifacts.js';

const log = logger.forModule('PROVISION');

/** Containers with a healthcheck are polled less often but take longer to report */
const HEALTH_WAIT = { retries: 20, intervalMs: 3000 };
const READY_WAIT = { retries: 20, intervalMs: 1000 };

export interface LessonConnection {
    executor: PooledExecutor;
    close(): Promise<void>;
}

export interface ProvisionerOptions {
    docker: DockerClient;
    /** Each lesson gets `<workspaceRoot>/<lesson.workspaceDir>` */
    workspaceRoot: string;
    output?: Output;
    /** Opens a database connection for in-process demos */
    connect: (lesson: LessonDefinition) => Promise<LessonConnection>;
    /** Serves the lesson dashboard once the container is up */
    dashboard?: (lesson: LessonDefinition) => Promise<void>;
}

export interface SetupOptions {
    dashboard?: boolean;
}

export interface CleanupOptions {
    purgeWorkspace?: boolean;
}

async function pathExists(target: string): Promise<boolean> {
    try {
        await access(target);
        return true;
    } catch {
        return false;
    }
}

export class Provisioner {
    private readonly docker: DockerClient;
    private readonly output: Output;

    constructor(private readonly options: ProvisionerOptions) {
        this.docker = options.docker;
        this.output = options.output ?? consoleOutput;
    }

    workspaceFor(lesson: LessonDefinition): string {
        return path.resolve(this.options.workspaceRoot, lesson.workspaceDir);
    }

    async setup(lesson: LessonDefinition, options: SetupOptions = {}): Promise<VerificationReport> {
        const workspace = this.workspaceFor(lesson);
        log.info(`Setting up ${lesson.title}`, { lessonId: lesson.id, workspace });

        if (!(await this.docker.isInstalled())) {
            throw new DockerNotInstalledError(this.docker.binPath);
        }

        // The old container still mounts the data dir until it is gone
        await this.removeContainer(lesson, workspace);
        await writeArtifacts(lesson, workspace);
        await this.launchContainer(lesson, workspace);
        await this.waitForContainer(lesson);

        for (const step of lesson.setup) {
            await this.runStep(lesson, step, workspace);
        }

        await this.runDemo(lesson);

        const report = await verifyLesson(lesson, this.docker, workspace);
        formatReport(report).forEach((line) => this.output.line(line));
        if (report.failures > 0) {
            throw new ProvisioningError(
                `${lesson.id} setup finished with ${String(report.failures)} failed check(s)`,
                { lessonId: lesson.id, failures: report.failures }
            );
        }

        if (options.dashboard !== false && this.options.dashboard) {
            await this.options.dashboard(lesson);
        }
        return report;
    }

    /**
     * Run the lesson demo against its container, printing results
     */
    async runDemo(lesson: LessonDefinition): Promise<void> {
        const demo = lesson.demo;
        if (demo.kind === 'srid') {
            const connection = await this.options.connect(lesson);
            try {
                const report = await new SridService(connection.executor).runDemo();
                printSridDemo(report, this.output);
            } finally {
                await connection.close();
            }
            return;
        }

        const workspace = this.workspaceFor(lesson);
        for (const step of demo.steps) {
            await this.runStep(lesson, step, workspace);
        }
    }

    /**
     * Bring an already provisioned lesson back up
     */
    async start(lesson: LessonDefinition): Promise<void> {
        const workspace = this.workspaceFor(lesson);
        if (!(await pathExists(workspace))) {
            throw new ProvisioningError(
                `${lesson.id} has not been set up (no workspace at ${workspace}); run setup first`,
                { lessonId: lesson.id, workspace }
            );
        }

        if (lesson.container.mode === 'compose') {
            await this.docker.compose(this.composeDir(lesson, workspace), ['up', '-d']);
        } else if (await this.docker.isRunning(lesson.container.name)) {
            log.info(`Container ${lesson.container.name} is already running`, { lessonId: lesson.id });
        } else if (await this.docker.containerExists(lesson.container.name)) {
            await this.docker.start(lesson.container.name);
        } else {
            throw new ProvisioningError(
                `Container ${lesson.container.name} does not exist; run setup first`,
                { lessonId: lesson.id }
            );
        }

        await this.waitForContainer(lesson);
        if (this.options.dashboard) {
            await this.options.dashboard(lesson);
        }
    }

    async stop(lesson: LessonDefinition): Promise<void> {
        const workspace = this.workspaceFor(lesson);
        const composeDir = this.composeDir(lesson, workspace);

        if (lesson.container.mode === 'compose' && await pathExists(path.join(composeDir, 'docker-compose.yml'))) {
            await this.docker.compose(composeDir, ['down']);
            log.info(`Stopped ${lesson.id}`, { lessonId: lesson.id });
            return;
        }
        if (!(await this.docker.removeIfExists(lesson.container.name))) {
            log.info(`Container ${lesson.container.name} is not present`, { lessonId: lesson.id });
        }
    }

    async cleanup(lesson: LessonDefinition, options: CleanupOptions = {}): Promise<void> {
        await this.stop(lesson);
        log.info('Pruning unused Docker resources');
        await this.docker.prune();

        if (options.purgeWorkspace) {
            const workspace = this.workspaceFor(lesson);
            await rm(workspace, { recursive: true, force: true });
            log.info(`Removed ${workspace}`, { lessonId: lesson.id });
        }
    }

    private composeDir(lesson: LessonDefinition, workspace: string): string {
        return path.resolve(workspace, lesson.container.composeDir ?? '.');
    }

    private async removeContainer(lesson: LessonDefinition, workspace: string): Promise<void> {
        const composeDir = this.composeDir(lesson, workspace);
        if (lesson.container.mode === 'compose' && await pathExists(path.join(composeDir, 'docker-compose.yml'))) {
            await this.docker.compose(composeDir, ['down']);
        }
        await this.docker.removeIfExists(lesson.container.name);
    }

    private async launchContainer(lesson: LessonDefinition, workspace: string): Promise<void> {
        const { container, database } = lesson;
        if (container.mode === 'compose') {
            await this.docker.compose(this.composeDir(lesson, workspace), ['up', '-d']);
            return;
        }

        await this.docker.run({
            name: container.name,
            image: container.image,
            user: database.user,
            password: database.password,
            database: container.initialDatabase === false ? undefined : database.name,
            hostPort: database.port,
            healthCheck: container.healthCheck,
            volume: container.volume
                ? { hostPath: path.resolve(workspace, container.volume.hostPath), containerPath: container.volume.containerPath }
                : undefined,
            postgresArgs: container.postgresArgs ? ['postgres', ...container.postgresArgs] : undefined
        });
    }

    private async waitForContainer(lesson: LessonDefinition): Promise<void> {
        const { container, database } = lesson;
        if (container.healthCheck) {
            await this.docker.waitForHealthy(container.name, HEALTH_WAIT);
            return;
        }
        const initialDatabase = container.initialDatabase === false ? undefined : database.name;
        await this.docker.waitForReady(container.name, database.user, initialDatabase, READY_WAIT);
    }

    private async runStep(lesson: LessonDefinition, step: PsqlStep, workspace: string): Promise<void> {
        const connection: PsqlConnection = {
            user: lesson.database.user,
            database: step.database ?? lesson.database.name
        };
        log.info(step.description, { lessonId: lesson.id });

        let result: string;
        try {
            if ('file' in step) {
                const sql = await loadSql(lesson.id, step.file);
                const script = step.explain ? `${buildExplainSql(sql, step.explain)};\n` : sql;
                result = await this.docker.psql(lesson.container.name, connection, { sql: script, flags: step.flags });
            } else {
                result = await this.docker.psql(lesson.container.name, connection, {
                    command: step.command,
                    flags: step.flags
                });
            }
        } catch (error) {
            if (step.ignoreErrors && error instanceof DockerError) {
                log.warn(`${step.description} failed; continuing`, { lessonId: lesson.id, error: error.message });
                return;
            }
            throw error;
        }

        if (step.echo) {
            this.output.line(`-- ${step.description}`);
            this.output.line(result.trimEnd());
        }
        if (step.saveAs !== undefined) {
            await writeFile(path.join(workspace, step.saveAs), result, 'utf8');
        }
    }
}
