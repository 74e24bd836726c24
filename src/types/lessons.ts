/**
 * postgis-lab - Lesson Types
 *
 * A lesson is data: which container to run, which files to write, which SQL
 * to apply and demo, what to verify, and what its dashboard shows.
 */

import type { PooledExecutor } from './database.js';
import type { ExplainOptions } from '../utils/explain.js';

export type LessonId = 'day1' | 'day2' | 'day3' | 'day4' | 'day5' | 'day6';

export interface LessonDatabase {
    user: string;
    password: string;
    name: string;
    /** Host port PostgreSQL is published on */
    port: number;
}

export interface HealthCheckSpec {
    command: string;
    intervalSeconds: number;
    timeoutSeconds: number;
    retries: number;
}

export interface VolumeMount {
    /** Relative to the lesson workspace */
    hostPath: string;
    containerPath: string;
}

export interface ContainerSpec {
    name: string;
    image: string;
    mode: 'run' | 'compose';
    /** Directory holding docker-compose.yml, relative to the lesson workspace */
    composeDir?: string;
    /** Compose service name */
    service?: string;
    restart?: string;
    healthCheck?: HealthCheckSpec;
    /** Appended as `postgres <args>` to override server settings */
    postgresArgs?: string[];
    volume?: VolumeMount;
    /**
     * When false, POSTGRES_DB is not passed and the database is created by
     * a setup step instead.
     */
    initialDatabase?: boolean;
}

export type LessonArtifact =
    | { kind: 'sql'; source: string; path: string }
    | { kind: 'postgres-conf'; path: string; workMem: string }
    | { kind: 'compose'; path: string }
    | { kind: 'data-dir'; path: string; fresh: boolean }
    /** Written by the demo rather than at artifact time */
    | { kind: 'demo-output'; path: string };

interface PsqlStepOptions {
    description: string;
    /** Connect to this database instead of the lesson database */
    database?: string;
    flags?: string[];
    /** Log the failure and carry on */
    ignoreErrors?: boolean;
    /** Print psql output to stdout */
    echo?: boolean;
    /** Also write psql output to this workspace-relative path */
    saveAs?: string;
    /** Run a file's statement under EXPLAIN with these options */
    explain?: ExplainOptions;
}

/** A SQL file shipped in sql/<lesson>/ (sent on stdin) or a single -c command */
export type PsqlStep = PsqlStepOptions & ({ file: string } | { command: string });

export type DemoPlan =
    | { kind: 'psql'; steps: PsqlStep[] }
    | { kind: 'srid' };

export type VerificationCheck =
    | { kind: 'row-count'; table: string; expected: number }
    | { kind: 'positive-number'; name: string; sql: string };

export interface MetricDescriptor {
    key: string;
    label: string;
    unit?: string;
    decimals?: number;
}

export interface ActionField {
    name: string;
    label: string;
    type: 'text' | 'number' | 'select';
    placeholder?: string;
    options?: readonly string[];
}

export interface ActionDescriptor {
    label: string;
    /** API path relative to /api */
    path: string;
    fields?: ActionField[];
}

export interface ListDescriptor {
    title: string;
    /** API path relative to /api returning an array, or an object with `rows`/`demoResults` */
    path: string;
    columns: string[];
}

export interface DashboardDescriptor {
    port: number;
    title: string;
    subtitle: string;
    /** API path relative to /api polled for metric values */
    statsPath: string;
    metrics: MetricDescriptor[];
    actions: ActionDescriptor[];
    lists: ListDescriptor[];
}

export interface RouteContext {
    executor: PooledExecutor;
}

export interface RouteDefinition {
    method: 'GET' | 'POST';
    /** Relative to /api */
    path: string;
    description: string;
    handler: (body: unknown) => Promise<unknown>;
}

export interface LessonDefinition {
    id: LessonId;
    title: string;
    summary: string;
    /** Directory under the workspace root */
    workspaceDir: string;
    database: LessonDatabase;
    container: ContainerSpec;
    artifacts: LessonArtifact[];
    setup: PsqlStep[];
    demo: DemoPlan;
    checks: VerificationCheck[];
    dashboard: DashboardDescriptor;
    createRoutes: (context: RouteContext) => RouteDefinition[];
}
