/**
 * postgis-lab - Subprocess execution
 *
 * Runs the docker (or docker-compose) binary without a shell, collecting
 * stdout and stderr with a timeout.
 */

import { spawn } from 'node:child_process';
import { DockerError, DockerNotInstalledError } from '../types/index.js';

export interface DockerConfig {
    binPath: string;
    composeBinPath: string;
    timeout: number;
}

/**
 * Read Docker settings from the environment
 */
export function getDockerConfig(env: NodeJS.ProcessEnv = process.env): DockerConfig {
    const timeout = parseInt(env['DOCKER_TIMEOUT'] ?? '300000', 10);
    return {
        binPath: env['DOCKER_PATH'] ?? 'docker',
        composeBinPath: env['DOCKER_COMPOSE_PATH'] ?? 'docker-compose',
        timeout: Number.isFinite(timeout) && timeout > 0 ? timeout : 300000
    };
}

export interface ExecResult {
    stdout: string;
    stderr: string;
    exitCode: number;
}

export interface ExecOptions {
    timeout?: number;
    cwd?: string;
    /** Written to stdin, which is then closed */
    input?: string;
}

export type CommandRunner = (command: string, args: string[], options?: ExecOptions) => Promise<ExecResult>;

/**
 * Spawn `command` and resolve with its output once it exits. A missing
 * binary rejects with DockerNotInstalledError; a timeout kills the child
 * and rejects with DockerError.
 */
export function execCommand(
    command: string,
    args: string[],
    options: ExecOptions = {}
): Promise<ExecResult> {
    const timeout = options.timeout ?? 300000;

    return new Promise((resolve, reject) => {
        const child = spawn(command, args, {
            cwd: options.cwd ?? process.cwd(),
            stdio: ['pipe', 'pipe', 'pipe'],
            windowsHide: true
        });

        let stdout = '';
        let stderr = '';
        let killed = false;

        const timer = setTimeout(() => {
            killed = true;
            child.kill('SIGTERM');
            reject(new DockerError(
                `'${command} ${args[0] ?? ''}' timed out after ${String(timeout)}ms`,
                null,
                stderr
            ));
        }, timeout);

        child.stdout.on('data', (data: Buffer) => {
            stdout += data.toString();
        });

        child.stderr.on('data', (data: Buffer) => {
            stderr += data.toString();
        });

        if (options.input !== undefined) {
            child.stdin.write(options.input);
        }
        child.stdin.end();

        child.on('close', (code) => {
            clearTimeout(timer);
            if (!killed) {
                resolve({ stdout, stderr, exitCode: code ?? 0 });
            }
        });

        child.on('error', (err) => {
            clearTimeout(timer);
            if (err.message.includes('ENOENT')) {
                reject(new DockerNotInstalledError(command));
            } else {
                reject(err);
            }
        });
    });
}
