/**
 * SQLite database backend using @libsql/client.
 */
import { createClient, type Client, type ResultSet } from "@libsql/client";
import { pathToFileURL } from "node:url";
import type {
  DatabaseBackend,
  DatabaseSession,
  Row,
  SqlParam,
} from "./backend.js";
import { SQLITE_SCHEMA_SQL, tableNames, type TableNames } from "./schema.js";

function databaseUrl(path: string): string {
  return path === ":memory:" ? path : pathToFileURL(path).href;
}

function toRows(result: ResultSet): Row[] {
  return result.rows.map((row) =>
    Object.fromEntries(result.columns.map((column, i) => [column, row[i]])),
  );
}

export class SQLiteBackend implements DatabaseBackend {
  readonly dialect = "sqlite" as const;
  readonly tables: TableNames = tableNames("sqlite");
  private client: Client;
  private inTransaction = false;

  constructor(path: string = ":memory:") {
    this.client = createClient({ url: databaseUrl(path) });
  }

  async initialize(): Promise<void> {
    await this.client.executeMultiple(SQLITE_SCHEMA_SQL);
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<number> {
    const result = await this.client.execute({ sql, args: params });
    return result.rowsAffected;
  }

  async query<T extends Row = Row>(
    sql: string,
    params: SqlParam[] = [],
  ): Promise<T[]> {
    const result = await this.client.execute({ sql, args: params });
    return toRows(result) as T[];
  }

  async queryOne<T extends Row = Row>(
    sql: string,
    params: SqlParam[] = [],
  ): Promise<T | null> {
    const rows = await this.query<T>(sql, params);
    return rows[0] ?? null;
  }

  /**
   * Statements inside `fn` run on the client's own connection between
   * BEGIN and COMMIT. `client.transaction()` would hand that connection
   * over and open a fresh one afterwards, which empties a ":memory:" database.
   */
  async transaction<T>(fn: (tx: DatabaseSession) => Promise<T>): Promise<T> {
    if (this.inTransaction) {
      throw new Error("SQLiteBackend does not support nested transactions");
    }
    this.inTransaction = true;
    try {
      await this.client.execute("BEGIN IMMEDIATE");
      try {
        const result = await fn(this);
        await this.client.execute("COMMIT");
        return result;
      } catch (err) {
        await this.client.execute("ROLLBACK");
        throw err;
      }
    } finally {
      this.inTransaction = false;
    }
  }

  async close(): Promise<void> {
    this.client.close();
  }
}
