import { UnsupportedIntrospectionError } from "../domain/errors.js";
import { SchemaSource } from "../domain/schemaSource.js";
import { NO_DESCRIPTION, TableSchema, WholeSchemaRecord } from "../domain/types.js";
import { getLogger } from "../infra/logging/logger.js";
import { fullSchema } from "../pipelines/schemaChunking.js";

const logger = getLogger("schema-extractor");

export class SchemaExtractor {
  constructor(private readonly source: SchemaSource) {}

  /**
   * One {@link TableSchema} per table, in the order given or, when no names
   * are given, in the order the source enumerates its tables.
   */
  async extractSchemas(tableNames?: string[]): Promise<TableSchema[]> {
    const names =
      tableNames && tableNames.length > 0 ? tableNames : await this.source.listUsableTables();

    const schemas: TableSchema[] = [];
    for (const tableName of names) {
      schemas.push(await this.extractTableSchema(tableName));
    }

    logger.debug("Extracted table schemas", { tables: schemas.length });
    return schemas;
  }

  async extractTableSchema(tableName: string): Promise<TableSchema> {
    const rawTableInfo = await this.source.getTableInfo(tableName, true);
    const columns = await this.source.getColumns(tableName);
    const tableComment = await this.readTableComment(tableName);

    return Object.freeze({
      tableName,
      columnsNames: Object.freeze(columns.map((column) => column.name)),
      rawTableInfo,
      tableComment,
    });
  }

  private async readTableComment(tableName: string): Promise<string> {
    try {
      const comment = await this.source.getTableComment(tableName);
      return comment?.trim() ? comment : NO_DESCRIPTION;
    } catch (error) {
      if (error instanceof UnsupportedIntrospectionError) {
        logger.debug("Table comments not supported by source", { table: tableName });
        return NO_DESCRIPTION;
      }
      throw error;
    }
  }
}

export function toWholeSchemaRecord(schema: TableSchema): WholeSchemaRecord {
  return {
    table_name: schema.tableName,
    columns_names: [...schema.columnsNames],
    table_schema: fullSchema(schema),
  };
}
