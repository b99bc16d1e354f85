export interface ColumnDescriptor {
  name: string;
  dataType?: string;
  nullable?: boolean;
  comment?: string | null;
}

/**
 * Narrow introspection capability consumed by the schema extractor.
 *
 * `getTableComment` resolves `null` when the table has no comment and may
 * reject with `UnsupportedIntrospectionError` when the dialect has no notion
 * of table comments. Every other failure is a `SourceUnavailableError`.
 */
export interface SchemaSource {
  listUsableTables(): Promise<string[]>;
  getTableInfo(tableName: string, includeColumnComments: boolean): Promise<string>;
  getColumns(tableName: string): Promise<ColumnDescriptor[]>;
  getTableComment(tableName: string): Promise<string | null>;
}
