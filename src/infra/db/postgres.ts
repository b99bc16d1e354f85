import { Pool } from "pg";

export interface Queryable {
  query(
    text: string,
    values?: unknown[],
  ): Promise<{ rows: Array<Record<string, unknown>> }>;
}

export function createPostgresPool(connectionString: string): Pool {
  return new Pool({
    connectionString,
    max: 4,
    idleTimeoutMillis: 30_000,
  });
}

export function quoteIdentifier(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`;
}
