/**
 * postgis-lab - Database Types
 *
 * Connection configuration, pool statistics and the query executor seam
 * that lesson services run their SQL through.
 */

/**
 * PostgreSQL connection parameters for a lesson database
 */
export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}

/**
 * Connection pool statistics
 */
export interface PoolStats {
  /** Total connections in pool */
  total: number;

  /** Active connections (in use) */
  active: number;

  /** Idle connections (available) */
  idle: number;

  /** Waiting requests in queue */
  waiting: number;

  /** Total queries executed */
  totalQueries: number;
}

/**
 * Database connection health status
 */
export interface HealthStatus {
  connected: boolean;
  latencyMs?: number | undefined;
  version?: string | undefined;
  poolStats?: PoolStats | undefined;
  details?: Record<string, unknown> | undefined;
  error?: string | undefined;
}

export type Row = Record<string, unknown>;

/**
 * Result of a single statement
 */
export interface ExecuteResult {
  rows: Row[];
  /** Rows affected or returned; 0 when the driver reports none */
  rowCount: number;
}

/**
 * Anything that can run SQL: the pooled connection, a single checked-out
 * client inside a transaction, or a test double.
 */
export interface QueryExecutor {
  execute(sql: string, params?: unknown[]): Promise<ExecuteResult>;

  /**
   * Run `work` on one connection inside BEGIN/COMMIT, rolling back when it throws
   */
  transaction<T>(work: (tx: QueryExecutor) => Promise<T>): Promise<T>;
}

/**
 * An executor backed by a pool that can be torn down and reopened, so
 * new sessions pick up settings changed with ALTER SYSTEM + pg_reload_conf().
 */
export interface PooledExecutor extends QueryExecutor {
  recycle(): Promise<void>;
}
