import { z } from "zod";
import { SourceUnavailableError } from "../../domain/errors.js";
import { ColumnDescriptor, SchemaSource } from "../../domain/schemaSource.js";
import { Queryable, quoteIdentifier } from "../db/postgres.js";

const MAX_SAMPLE_VALUE_CHARS = 100;

export interface PostgresSchemaSourceOptions {
  schema?: string;
  sampleRowsInTableInfo?: number;
  includeTables?: string[];
  ignoreTables?: string[];
}

const tableRowSchema = z.object({ table_name: z.string() });

const columnRowSchema = z.object({
  column_name: z.string(),
  data_type: z.string(),
  udt_name: z.string(),
  is_nullable: z.string(),
  character_maximum_length: z.coerce.number().nullable(),
  column_comment: z.string().nullable(),
});

const primaryKeyRowSchema = z.object({
  constraint_name: z.string(),
  column_name: z.string(),
});

const commentRowSchema = z.object({ comment: z.string().nullable() });

type ColumnRow = z.infer<typeof columnRowSchema>;

/**
 * {@link SchemaSource} over a PostgreSQL connection.
 *
 * Table info is rendered as a `CREATE TABLE` statement followed by optional
 * `Column Comments:` and `N rows from <table> table:` comment blocks.
 */
export class PostgresSchemaSource implements SchemaSource {
  private readonly schema: string;

  private readonly sampleRows: number;

  constructor(
    private readonly db: Queryable,
    private readonly options: PostgresSchemaSourceOptions = {},
  ) {
    this.schema = options.schema ?? "public";
    this.sampleRows = options.sampleRowsInTableInfo ?? 3;
  }

  async listUsableTables(): Promise<string[]> {
    const rows = await this.select(
      "list tables",
      tableRowSchema,
      `
        SELECT table_name
        FROM information_schema.tables
        WHERE table_schema = $1
          AND table_type IN ('BASE TABLE', 'VIEW')
        ORDER BY table_name ASC
      `,
      [this.schema],
    );

    const include = new Set(this.options.includeTables ?? []);
    const ignore = new Set(this.options.ignoreTables ?? []);
    return rows
      .map((row) => row.table_name)
      .filter((name) => include.size === 0 || include.has(name))
      .filter((name) => !ignore.has(name));
  }

  async getTableInfo(tableName: string, includeColumnComments: boolean): Promise<string> {
    const columns = await this.selectColumns(tableName);
    if (columns.length === 0) {
      throw new SourceUnavailableError(`Table not found: ${this.schema}.${tableName}`);
    }

    const sections = [await this.renderCreateTable(tableName, columns)];

    if (includeColumnComments) {
      const comments = renderColumnComments(columns);
      if (comments) {
        sections.push(`/*\nColumn Comments: ${comments}\n*/`);
      }
    }

    if (this.sampleRows > 0) {
      sections.push(await this.renderSampleRows(tableName, columns));
    }

    return sections.join("\n\n");
  }

  async getColumns(tableName: string): Promise<ColumnDescriptor[]> {
    const columns = await this.selectColumns(tableName);
    return columns.map((column) => ({
      name: column.column_name,
      dataType: renderColumnType(column),
      nullable: column.is_nullable === "YES",
      comment: column.column_comment,
    }));
  }

  async getTableComment(tableName: string): Promise<string | null> {
    const rows = await this.select(
      `read comment of ${tableName}`,
      commentRowSchema,
      `
        SELECT obj_description(c.oid, 'pg_class') AS comment
        FROM pg_catalog.pg_class c
        JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
        WHERE n.nspname = $1 AND c.relname = $2
      `,
      [this.schema, tableName],
    );
    return rows[0]?.comment ?? null;
  }

  private async selectColumns(tableName: string): Promise<ColumnRow[]> {
    return this.select(
      `read columns of ${tableName}`,
      columnRowSchema,
      `
        SELECT
          c.column_name,
          c.data_type,
          c.udt_name,
          c.is_nullable,
          c.character_maximum_length,
          col_description(pc.oid, c.ordinal_position::int) AS column_comment
        FROM information_schema.columns c
        JOIN pg_catalog.pg_namespace n ON n.nspname = c.table_schema
        JOIN pg_catalog.pg_class pc ON pc.relname = c.table_name AND pc.relnamespace = n.oid
        WHERE c.table_schema = $1 AND c.table_name = $2
        ORDER BY c.ordinal_position ASC
      `,
      [this.schema, tableName],
    );
  }

  private async renderCreateTable(tableName: string, columns: ColumnRow[]): Promise<string> {
    const primaryKey = await this.select(
      `read primary key of ${tableName}`,
      primaryKeyRowSchema,
      `
        SELECT tc.constraint_name, kcu.column_name
        FROM information_schema.table_constraints tc
        JOIN information_schema.key_column_usage kcu
          ON kcu.constraint_name = tc.constraint_name
         AND kcu.table_schema = tc.table_schema
         AND kcu.table_name = tc.table_name
        WHERE tc.table_schema = $1
          AND tc.table_name = $2
          AND tc.constraint_type = 'PRIMARY KEY'
        ORDER BY kcu.ordinal_position ASC
      `,
      [this.schema, tableName],
    );

    const lines = columns.map(
      (column) =>
        `\t${column.column_name} ${renderColumnType(column)}${column.is_nullable === "NO" ? " NOT NULL" : ""}`,
    );
    if (primaryKey.length > 0) {
      const keyColumns = primaryKey.map((row) => row.column_name).join(", ");
      lines.push(`\tCONSTRAINT ${primaryKey[0].constraint_name} PRIMARY KEY (${keyColumns})`);
    }

    return `CREATE TABLE ${tableName} (\n${lines.join(", \n")}\n)`;
  }

  private async renderSampleRows(tableName: string, columns: ColumnRow[]): Promise<string> {
    const names = columns.map((column) => column.column_name);
    const { rows } = await this.run(
      `sample rows of ${tableName}`,
      `SELECT ${names.map(quoteIdentifier).join(", ")} FROM ${quoteIdentifier(this.schema)}.${quoteIdentifier(tableName)} LIMIT $1`,
      [this.sampleRows],
    );

    const body = [
      names.join("\t"),
      ...rows.map((row) => names.map((name) => formatSampleValue(row[name])).join("\t")),
    ];
    return `/*\n${this.sampleRows} rows from ${tableName} table:\n${body.join("\n")}\n*/`;
  }

  private async select<T extends z.ZodTypeAny>(
    description: string,
    rowSchema: T,
    text: string,
    values: unknown[],
  ): Promise<Array<z.infer<T>>> {
    const { rows } = await this.run(description, text, values);
    const parsed = z.array(rowSchema).safeParse(rows);
    if (!parsed.success) {
      throw new SourceUnavailableError(
        `Unexpected row shape while trying to ${description}.`,
        parsed.error,
      );
    }
    return parsed.data;
  }

  private async run(
    description: string,
    text: string,
    values: unknown[],
  ): Promise<{ rows: Array<Record<string, unknown>> }> {
    try {
      return await this.db.query(text, values);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SourceUnavailableError(`Schema source failed to ${description}: ${reason}`, error);
    }
  }
}

export function renderColumnType(column: {
  data_type: string;
  udt_name: string;
  character_maximum_length: number | null;
}): string {
  switch (column.data_type) {
    case "character varying":
      return column.character_maximum_length
        ? `VARCHAR(${column.character_maximum_length})`
        : "VARCHAR";
    case "character":
      return `CHAR(${column.character_maximum_length ?? 1})`;
    case "USER-DEFINED":
      return column.udt_name.toUpperCase();
    case "ARRAY":
      return `${column.udt_name.replace(/^_/, "").toUpperCase()}[]`;
    default:
      return column.data_type.toUpperCase();
  }
}

function renderColumnComments(columns: ColumnRow[]): string | null {
  const entries = columns
    .filter((column) => column.column_comment)
    .map(
      (column) =>
        `'${column.column_name}': '${escapeCommentClose(column.column_comment ?? "")}'`,
    );
  return entries.length > 0 ? `{${entries.join(", ")}}` : null;
}

export function formatSampleValue(value: unknown): string {
  let text: string;
  if (value === null || value === undefined) {
    text = "NULL";
  } else if (value instanceof Date) {
    text = value.toISOString();
  } else if (Buffer.isBuffer(value)) {
    text = `<${value.length} bytes>`;
  } else if (typeof value === "object") {
    text = JSON.stringify(value);
  } else {
    text = String(value);
  }
  text = escapeCommentClose(text);
  return text.length > MAX_SAMPLE_VALUE_CHARS ? text.slice(0, MAX_SAMPLE_VALUE_CHARS) : text;
}

// Values are rendered inside /* ... */ blocks; a literal */ would end the block.
function escapeCommentClose(text: string): string {
  return text.replace(/\*\//g, "* /");
}
