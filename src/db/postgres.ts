/**
 * PostgreSQL database backend using postgres-js.
 */
import postgres from "postgres";
import type {
  DatabaseBackend,
  DatabaseSession,
  Row,
  SqlParam,
} from "./backend.js";
import { postgresSchemaSql, tableNames, type TableNames } from "./schema.js";

/** Rewrite `?` placeholders as `$1`, `$2`, ... */
export function toPositional(sql: string): string {
  let n = 0;
  return sql.replace(/\?/g, () => `$${++n}`);
}

class PostgresSession implements DatabaseSession {
  constructor(private readonly sql: postgres.Sql | postgres.TransactionSql) {}

  async execute(sql: string, params: SqlParam[] = []): Promise<number> {
    const result = await this.sql.unsafe(toPositional(sql), params);
    return result.count;
  }

  async query<T extends Row = Row>(
    sql: string,
    params: SqlParam[] = [],
  ): Promise<T[]> {
    const rows = await this.sql.unsafe<T[]>(toPositional(sql), params);
    return [...rows] as T[];
  }

  async queryOne<T extends Row = Row>(
    sql: string,
    params: SqlParam[] = [],
  ): Promise<T | null> {
    const rows = await this.query<T>(sql, params);
    return rows[0] ?? null;
  }
}

export class PostgresBackend implements DatabaseBackend {
  readonly dialect = "postgres" as const;
  readonly tables: TableNames;
  private sql: postgres.Sql;
  private session: PostgresSession;
  private schema: string;

  constructor(connectionString: string, schema = "raw") {
    this.sql = postgres(connectionString, { onnotice: () => undefined });
    this.session = new PostgresSession(this.sql);
    this.schema = schema;
    this.tables = tableNames("postgres", schema);
  }

  async initialize(): Promise<void> {
    await this.sql.unsafe(postgresSchemaSql(this.schema));
  }

  execute(sql: string, params?: SqlParam[]): Promise<number> {
    return this.session.execute(sql, params);
  }

  query<T extends Row = Row>(sql: string, params?: SqlParam[]): Promise<T[]> {
    return this.session.query<T>(sql, params);
  }

  queryOne<T extends Row = Row>(
    sql: string,
    params?: SqlParam[],
  ): Promise<T | null> {
    return this.session.queryOne<T>(sql, params);
  }

  async transaction<T>(fn: (tx: DatabaseSession) => Promise<T>): Promise<T> {
    // `begin` commits when the callback resolves and rolls back on throw.
    const results: T[] = [];
    await this.sql.begin(async (tx) => {
      results.push(await fn(new PostgresSession(tx)));
    });
    return results[0];
  }

  async close(): Promise<void> {
    await this.sql.end();
  }
}
