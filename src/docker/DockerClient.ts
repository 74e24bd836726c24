/**
 * postgis-lab - Docker CLI client
 *
 * Everything the lessons need from Docker: container lifecycle, readiness
 * polling, psql inside the container, compose and pruning. Commands go
 * through a CommandRunner so tests can answer them without a daemon.
 */

import { DockerError, ProvisioningError } from '../types/index.js';
import type { HealthCheckSpec } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { execCommand, getDockerConfig } from './exec.js';
import type { CommandRunner, DockerConfig, ExecOptions, ExecResult } from './exec.js';

const log = logger.forModule('DOCKER');

export interface RunContainerOptions {
    name: string;
    image: string;
    user: string;
    password: string;
    /** Omit to let the image create only its default database */
    database?: string | undefined;
    hostPort: number;
    healthCheck?: HealthCheckSpec | undefined;
    /** Absolute host path and container path */
    volume?: { hostPath: string; containerPath: string } | undefined;
    /** Passed to the server after the image name, e.g. ['-c', 'work_mem=4MB'] */
    postgresArgs?: string[] | undefined;
}

export interface PsqlConnection {
    user: string;
    database?: string | undefined;
}

export interface PsqlInput {
    /** Script sent on stdin */
    sql?: string | undefined;
    /** Single statement passed with -c */
    command?: string | undefined;
    flags?: string[] | undefined;
}

export interface WaitOptions {
    retries: number;
    intervalMs: number;
}

export interface DockerClientOptions {
    config?: DockerConfig;
    runner?: CommandRunner;
    sleep?: (ms: number) => Promise<void>;
}

const PRUNE_COMMANDS: readonly string[][] = [
    ['container', 'prune', '-f'],
    ['volume', 'prune', '-f'],
    ['image', 'prune', '-af'],
    ['network', 'prune', '-f']
];

function defaultSleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

// Keep passwords out of debug output
function redactArgs(args: readonly string[]): string[] {
    return args.map((arg) => (arg.startsWith('POSTGRES_PASSWORD=') ? 'POSTGRES_PASSWORD=[REDACTED]' : arg));
}

export class DockerClient {
    private readonly config: DockerConfig;
    private readonly runner: CommandRunner;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(options: DockerClientOptions = {}) {
        this.config = options.config ?? getDockerConfig();
        this.runner = options.runner ?? execCommand;
        this.sleep = options.sleep ?? defaultSleep;
    }

    /**
     * Run docker with `args`, resolving with the result whatever the exit code
     */
    async exec(args: string[], options: ExecOptions = {}): Promise<ExecResult> {
        log.debug('docker', { args: redactArgs(args), cwd: options.cwd });
        return this.runner(this.config.binPath, args, { timeout: this.config.timeout, ...options });
    }

    /**
     * Run docker with `args`, throwing DockerError on a non-zero exit
     */
    async check(args: string[], options: ExecOptions = {}): Promise<ExecResult> {
        const result = await this.exec(args, options);
        if (result.exitCode !== 0) {
            throw this.failure(`docker ${args[0] ?? ''}`, result);
        }
        return result;
    }

    get binPath(): string {
        return this.config.binPath;
    }

    async isInstalled(): Promise<boolean> {
        try {
            const result = await this.exec(['--version']);
            return result.exitCode === 0;
        } catch (error) {
            log.debug('docker --version failed', { error: error instanceof Error ? error.message : String(error) });
            return false;
        }
    }

    async containerExists(name: string): Promise<boolean> {
        return (await this.listNames(true)).includes(name);
    }

    async isRunning(name: string): Promise<boolean> {
        return (await this.listNames(false)).includes(name);
    }

    async start(name: string): Promise<void> {
        await this.check(['start', name]);
        log.info(`Started container ${name}`, { entityId: name });
    }

    /** Best effort */
    async stop(name: string): Promise<void> {
        await this.bestEffort(['stop', name]);
    }

    /** Best effort */
    async remove(name: string): Promise<void> {
        await this.bestEffort(['rm', name]);
    }

    /**
     * Stop and remove `name` when it exists. Resolves true when a container was removed.
     */
    async removeIfExists(name: string): Promise<boolean> {
        if (!(await this.containerExists(name))) {
            return false;
        }
        log.info(`Removing existing container ${name}`, { entityId: name });
        await this.stop(name);
        await this.remove(name);
        return true;
    }

    /**
     * Start a detached PostGIS container; resolves with its id
     */
    async run(options: RunContainerOptions): Promise<string> {
        const args = ['run', '-d', '--name', options.name,
            '-e', `POSTGRES_USER=${options.user}`,
            '-e', `POSTGRES_PASSWORD=${options.password}`];

        if (options.database !== undefined) {
            args.push('-e', `POSTGRES_DB=${options.database}`);
        }
        args.push('-p', `${String(options.hostPort)}:5432`);

        if (options.healthCheck) {
            const health = options.healthCheck;
            args.push(
                '--health-cmd', health.command,
                '--health-interval', `${String(health.intervalSeconds)}s`,
                '--health-timeout', `${String(health.timeoutSeconds)}s`,
                '--health-retries', String(health.retries)
            );
        }

        if (options.volume) {
            args.push('-v', `${options.volume.hostPath}:${options.volume.containerPath}`);
        }

        args.push(options.image, ...(options.postgresArgs ?? []));

        const result = await this.check(args);
        log.info(`Container ${options.name} started from ${options.image}`, { entityId: options.name });
        return result.stdout.trim();
    }

    /**
     * `.State.Health.Status` of a container, or '' when it has none or is gone
     */
    async healthStatus(name: string): Promise<string> {
        const result = await this.exec(['inspect', '--format', '{{.State.Health.Status}}', name]);
        return result.exitCode === 0 ? result.stdout.trim() : '';
    }

    async waitForHealthy(name: string, options: WaitOptions): Promise<void> {
        let status = '';
        for (let attempt = 1; attempt <= options.retries; attempt++) {
            status = await this.healthStatus(name);
            if (status === 'healthy') {
                log.info(`Container ${name} is healthy`, { entityId: name, attempt });
                return;
            }
            log.debug(`Waiting for ${name} to become healthy`, { attempt, status });
            if (attempt < options.retries) {
                await this.sleep(options.intervalMs);
            }
        }
        throw new ProvisioningError(
            `Container ${name} did not become healthy after ${String(options.retries)} attempts`,
            { container: name, lastStatus: status }
        );
    }

    /**
     * Poll pg_isready inside the container until the server accepts connections
     */
    async waitForReady(name: string, user: string, database: string | undefined, options: WaitOptions): Promise<void> {
        const args = ['exec', name, 'pg_isready', '-U', user];
        if (database !== undefined) {
            args.push('-d', database);
        }
        for (let attempt = 1; attempt <= options.retries; attempt++) {
            const result = await this.exec(args);
            if (result.exitCode === 0) {
                log.info(`PostgreSQL in ${name} is ready`, { entityId: name, attempt });
                return;
            }
            log.debug(`Waiting for PostgreSQL in ${name}`, { attempt });
            if (attempt < options.retries) {
                await this.sleep(options.intervalMs);
            }
        }
        throw new ProvisioningError(
            `PostgreSQL in ${name} was not ready after ${String(options.retries)} attempts`,
            { container: name }
        );
    }

    /**
     * Run psql inside the container. A script on stdin stops at its first
     * error so the exit code reflects it.
     */
    async psql(name: string, connection: PsqlConnection, input: PsqlInput): Promise<string> {
        const args = ['exec', '-i', name, 'psql', '-U', connection.user];
        if (connection.database !== undefined) {
            args.push('-d', connection.database);
        }
        if (input.sql !== undefined) {
            args.push('-v', 'ON_ERROR_STOP=1');
        }
        args.push(...(input.flags ?? []));
        if (input.command !== undefined) {
            args.push('-c', input.command);
        }

        const options: ExecOptions = input.sql !== undefined ? { input: input.sql } : {};
        const result = await this.exec(args, options);
        if (result.exitCode !== 0) {
            throw this.failure('psql', result, { container: name, database: connection.database });
        }
        return result.stdout;
    }

    /**
     * Single unaligned, tuples-only value
     */
    async psqlScalar(name: string, connection: PsqlConnection, sql: string): Promise<string> {
        const output = await this.psql(name, connection, { command: sql, flags: ['-t', '-A'] });
        return output.trim();
    }

    /**
     * Remove stopped containers and unused volumes, images and networks
     */
    async prune(): Promise<void> {
        for (const args of PRUNE_COMMANDS) {
            await this.bestEffort(args);
        }
    }

    /**
     * `docker compose <args>` in `dir`, falling back to the standalone
     * docker-compose binary when the compose plugin is missing
     */
    async compose(dir: string, args: string[]): Promise<ExecResult> {
        let result = await this.exec(['compose', ...args], { cwd: dir });

        if (result.exitCode !== 0 && /is not a docker command|unknown command/i.test(result.stderr)) {
            log.debug('docker compose plugin missing, trying docker-compose', { cwd: dir });
            result = await this.runner(this.config.composeBinPath, args, { timeout: this.config.timeout, cwd: dir });
        }

        if (result.exitCode !== 0) {
            throw this.failure(`docker compose ${args[0] ?? ''}`, result, { cwd: dir });
        }
        return result;
    }

    private async listNames(all: boolean): Promise<string[]> {
        const args = all ? ['ps', '-a', '--format', '{{.Names}}'] : ['ps', '--format', '{{.Names}}'];
        const result = await this.check(args);
        return result.stdout.split('\n').map((line) => line.trim()).filter((line) => line.length > 0);
    }

    private async bestEffort(args: string[]): Promise<void> {
        const result = await this.exec(args);
        if (result.exitCode !== 0) {
            log.debug(`docker ${args.join(' ')} exited ${String(result.exitCode)}`, {
                stderr: result.stderr.trim()
            });
        }
    }

    private failure(what: string, result: ExecResult, details?: Record<string, unknown>): DockerError {
        const reason = result.stderr.trim() || result.stdout.trim() || `exit code ${String(result.exitCode)}`;
        return new DockerError(`${what} failed: ${reason}`, result.exitCode, result.stderr, details);
    }
}
