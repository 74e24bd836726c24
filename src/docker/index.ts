export { DockerClient } from './DockerClient.js';
export type {
    RunContainerOptions,
    PsqlConnection,
    PsqlInput,
    WaitOptions,
    DockerClientOptions
} from './DockerClient.js';
export { execCommand, getDockerConfig } from './exec.js';
export type { CommandRunner, DockerConfig, ExecOptions, ExecResult } from './exec.js';
