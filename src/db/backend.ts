/**
 * Abstract database backend interface.
 *
 * All implementations use raw SQL, no ORM. Statements are written with
 * `?` placeholders; backends translate them to their own syntax.
 */
import type { TableNames } from "./schema.js";

export type SqlDialect = "sqlite" | "postgres";

export type SqlParam = string | number | null;

export type Row = Record<string, unknown>;

/** Statement surface shared by the backend and its transactions. */
export interface DatabaseSession {
  /** Execute a write statement and return the number of affected rows. */
  execute(sql: string, params?: SqlParam[]): Promise<number>;

  /** Run a SELECT and return all matching rows. */
  query<T extends Row = Row>(sql: string, params?: SqlParam[]): Promise<T[]>;

  /** Run a SELECT and return the first row, or null. */
  queryOne<T extends Row = Row>(
    sql: string,
    params?: SqlParam[],
  ): Promise<T | null>;
}

export interface DatabaseBackend extends DatabaseSession {
  readonly dialect: SqlDialect;

  /** Qualified names of the pipeline's tables. */
  readonly tables: TableNames;

  /** Create schema, tables and indexes if absent. Safe to repeat. */
  initialize(): Promise<void>;

  /**
   * Run `fn` inside a transaction. Commits when `fn` resolves, rolls back
   * when it throws; statements must go through the given session.
   */
  transaction<T>(fn: (tx: DatabaseSession) => Promise<T>): Promise<T>;

  /** Close the connection / release resources. */
  close(): Promise<void>;
}
