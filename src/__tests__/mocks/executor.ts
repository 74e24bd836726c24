/**
 * postgis-lab - Query Executor Mock
 *
 * Records every statement and answers from matchers first, then from a
 * queue of canned results, then with an empty result.
 */

import type { ExecuteResult, PooledExecutor, QueryExecutor, Row } from "../../types/index.js";

interface Responder {
  match: string | RegExp;
  respond: (sql: string, params?: unknown[]) => ExecuteResult;
}

export function rowsResult(rows: Row[]): ExecuteResult {
  return { rows, rowCount: rows.length };
}

export class MockExecutor implements PooledExecutor {
  public executedQueries: { sql: string; params?: unknown[] | undefined }[] = [];
  public transactions = 0;
  public recycles = 0;
  private nextResults: ExecuteResult[] = [];
  private responders: Responder[] = [];

  /** Queue a result for the next statement no matcher claims */
  setNextResult(result: ExecuteResult): this {
    this.nextResults.push(result);
    return this;
  }

  /** Answer every statement containing `match` (or matching the pattern) */
  respondTo(match: string | RegExp, rows: Row[] | ((sql: string, params?: unknown[]) => Row[])): this {
    this.responders.push({
      match,
      respond: (sql, params) => rowsResult(typeof rows === "function" ? rows(sql, params) : rows),
    });
    return this;
  }

  /** Throw `error` for every statement containing `match` */
  failOn(match: string | RegExp, error: Error): this {
    this.responders.push({
      match,
      respond: () => {
        throw error;
      },
    });
    return this;
  }

  /** SQL text of every executed statement, in order */
  get statements(): string[] {
    return this.executedQueries.map((query) => query.sql);
  }

  async execute(sql: string, params?: unknown[]): Promise<ExecuteResult> {
    this.executedQueries.push({ sql, params });
    const responder = this.responders.find(({ match }) =>
      typeof match === "string" ? sql.includes(match) : match.test(sql),
    );
    if (responder) {
      return responder.respond(sql, params);
    }
    return this.nextResults.shift() ?? { rows: [], rowCount: 0 };
  }

  async transaction<T>(work: (tx: QueryExecutor) => Promise<T>): Promise<T> {
    this.transactions++;
    return work(this);
  }

  async recycle(): Promise<void> {
    this.recycles++;
  }
}
