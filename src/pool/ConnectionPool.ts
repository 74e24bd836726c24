/**
 * postgis-lab - Connection Pool Manager
 *
 * Wraps pg connection pooling with health monitoring, statistics tracking,
 * graceful shutdown and recycling. Lesson dashboards and the SRID tool run
 * their SQL through it as a QueryExecutor.
 */

import pg from 'pg';
import type { PoolClient, QueryResult as PgQueryResult } from 'pg';
import type {
    DatabaseConfig,
    PoolStats,
    HealthStatus,
    Row,
    ExecuteResult,
    QueryExecutor,
    PooledExecutor
} from '../types/index.js';
import { PoolError, ConnectionError, QueryError } from '../types/index.js';
import { logger } from '../utils/logger.js';

const log = logger.forModule('POOL');
const queryLog = logger.forModule('QUERY');

/**
 * Connection pool configuration
 */
export interface ConnectionPoolConfig extends DatabaseConfig {
    applicationName?: string | undefined;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
}

function toExecuteResult(result: PgQueryResult<Row>): ExecuteResult {
    return { rows: result.rows, rowCount: result.rowCount ?? 0 };
}

/**
 * Executor bound to one checked-out client, handed to transaction callbacks
 */
class ClientExecutor implements QueryExecutor {
    constructor(private readonly client: PoolClient) { }

    async execute(sql: string, params?: unknown[]): Promise<ExecuteResult> {
        try {
            return toExecuteResult(await this.client.query<Row>(sql, params));
        } catch (error) {
            throw new QueryError(errorMessage(error), { sql: sql.substring(0, 100) });
        }
    }

    // Already inside a transaction on this client
    async transaction<T>(work: (tx: QueryExecutor) => Promise<T>): Promise<T> {
        return work(this);
    }
}

/**
 * Connection pool wrapper with statistics and health monitoring
 */
export class ConnectionPool implements PooledExecutor {
    private pool: pg.Pool | null = null;
    private config: ConnectionPoolConfig;
    private stats: PoolStats = {
        total: 0,
        active: 0,
        idle: 0,
        waiting: 0,
        totalQueries: 0
    };
    private shuttingDown = false;

    constructor(config: ConnectionPoolConfig) {
        this.config = config;
    }

    /**
     * Initialize the connection pool and test one connection
     */
    async initialize(): Promise<void> {
        if (this.pool !== null) {
            log.warn('Connection pool already initialized');
            return;
        }

        log.info('Initializing PostgreSQL connection pool', {
            host: this.config.host,
            port: this.config.port,
            database: this.config.database
        });
        this.pool = await this.createPool();
    }

    /**
     * Open a pg.Pool and test one connection; the pool is ended again on failure
     */
    private async createPool(): Promise<pg.Pool> {
        const pool = new pg.Pool({
            host: this.config.host,
            port: this.config.port,
            user: this.config.user,
            password: this.config.password,
            database: this.config.database,
            max: 10,
            min: 0,
            idleTimeoutMillis: 10000,
            connectionTimeoutMillis: 10000,
            allowExitOnIdle: true,
            application_name: this.config.applicationName ?? 'postgis-lab'
        });

        pool.on('connect', () => {
            this.stats.total++;
            log.debug('New connection established');
        });

        pool.on('acquire', () => {
            this.stats.active++;
            this.stats.idle = Math.max(0, this.stats.idle - 1);
        });

        pool.on('release', () => {
            this.stats.active = Math.max(0, this.stats.active - 1);
            this.stats.idle++;
        });

        pool.on('remove', () => {
            this.stats.total = Math.max(0, this.stats.total - 1);
            this.stats.idle = Math.max(0, this.stats.idle - 1);
        });

        pool.on('error', (err) => {
            log.error('Pool error', { error: err.message });
        });

        try {
            const client = await pool.connect();
            const result = await client.query<{ version?: string }>('SELECT version()');
            client.release();

            log.info('PostgreSQL connection pool initialized', {
                version: result.rows[0]?.version ?? 'unknown'
            });
            return pool;
        } catch (error) {
            await pool.end().catch((endError: unknown) => {
                log.debug('Ignoring pool cleanup failure', { error: errorMessage(endError) });
            });
            const message = errorMessage(error);
            log.error('Failed to initialize connection pool', { error: message, code: 'POOL_INIT_FAILED' });
            throw new ConnectionError(`Failed to connect to PostgreSQL: ${message}`, {
                host: this.config.host,
                port: this.config.port,
                database: this.config.database
            });
        }
    }

    /**
     * Get a connection from the pool
     */
    async getConnection(): Promise<PoolClient> {
        if (this.pool === null) {
            throw new PoolError('Connection pool not initialized');
        }

        if (this.shuttingDown) {
            throw new PoolError('Connection pool is shutting down');
        }

        try {
            this.stats.waiting++;
            const client = await this.pool.connect();
            this.stats.waiting = Math.max(0, this.stats.waiting - 1);
            return client;
        } catch (error) {
            this.stats.waiting = Math.max(0, this.stats.waiting - 1);
            throw new PoolError(`Failed to acquire connection: ${errorMessage(error)}`);
        }
    }

    /**
     * Release a connection back to the pool
     */
    releaseConnection(client: PoolClient): void {
        try {
            client.release();
        } catch (error) {
            log.warn('Error releasing connection', { error: errorMessage(error) });
        }
    }

    /**
     * Execute a statement on any pooled connection
     */
    async execute(sql: string, params?: unknown[]): Promise<ExecuteResult> {
        if (this.pool === null) {
            throw new PoolError('Connection pool not initialized');
        }

        const startTime = Date.now();
        this.stats.totalQueries++;

        try {
            const result = await this.pool.query<Row>(sql, params);

            queryLog.debug('Query executed', {
                sql: sql.substring(0, 100),
                rowCount: result.rowCount,
                durationMs: Date.now() - startTime
            });

            return toExecuteResult(result);
        } catch (error) {
            const message = errorMessage(error);
            queryLog.error('Query failed', { sql: sql.substring(0, 100), error: message });
            throw new QueryError(message, { sql: sql.substring(0, 100) });
        }
    }

    async transaction<T>(work: (tx: QueryExecutor) => Promise<T>): Promise<T> {
        const client = await this.getConnection();
        try {
            await client.query('BEGIN');
            const result = await work(new ClientExecutor(client));
            await client.query('COMMIT');
            return result;
        } catch (error) {
            await client.query('ROLLBACK').catch((rollbackError: unknown) => {
                log.warn('Rollback failed', { error: errorMessage(rollbackError) });
            });
            throw error;
        } finally {
            this.releaseConnection(client);
        }
    }

    /**
     * Swap in a freshly connected pool, then end the old one. Server settings
     * changed with ALTER SYSTEM only reach sessions started after
     * pg_reload_conf(). When the new pool cannot connect the old one stays.
     */
    async recycle(): Promise<void> {
        if (this.pool === null) {
            throw new PoolError('Connection pool not initialized');
        }

        log.info('Recycling connection pool');
        const fresh = await this.createPool();
        const previous = this.pool;
        this.pool = fresh;
        await previous.end().catch((error: unknown) => {
            log.warn('Error ending the previous pool', { error: errorMessage(error) });
        });
    }

    /**
     * Get pool statistics
     */
    getStats(): PoolStats {
        if (this.pool !== null) {
            this.stats.total = this.pool.totalCount;
            this.stats.idle = this.pool.idleCount;
            this.stats.waiting = this.pool.waitingCount;
            this.stats.active = this.stats.total - this.stats.idle;
        }
        return { ...this.stats };
    }

    /**
     * Check pool health
     */
    async checkHealth(): Promise<HealthStatus> {
        if (this.pool === null || this.shuttingDown) {
            return {
                connected: false,
                error: this.shuttingDown ? 'Pool is shutting down' : 'Pool not initialized'
            };
        }

        const startTime = Date.now();

        try {
            const result = await this.pool.query<{ version?: string; current_database?: string }>(
                'SELECT version(), current_database()'
            );
            const latencyMs = Date.now() - startTime;
            const row = result.rows[0];

            return {
                connected: true,
                latencyMs,
                version: row?.version,
                poolStats: this.getStats(),
                details: {
                    database: row?.current_database
                }
            };
        } catch (error) {
            return {
                connected: false,
                error: errorMessage(error),
                latencyMs: Date.now() - startTime
            };
        }
    }

    /**
     * Gracefully shutdown the pool
     */
    async shutdown(): Promise<void> {
        if (this.pool === null) {
            return;
        }

        log.info('Shutting down connection pool...');
        this.shuttingDown = true;

        try {
            await this.pool.end();
            this.pool = null;
            log.info('Connection pool shut down successfully');
        } catch (error) {
            log.error('Error during pool shutdown', { error: errorMessage(error) });
            throw error;
        }
    }

    isInitialized(): boolean {
        return this.pool !== null && !this.shuttingDown;
    }
}
