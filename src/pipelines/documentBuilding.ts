import { z } from "zod";
import { MalformedRecordError } from "../domain/errors.js";
import {
  CHUNK_TYPES,
  SCHEMA_DOCUMENT_SOURCE,
  SchemaChunkRecord,
  SchemaDocument,
  SchemaDocumentMetadata,
  WholeSchemaRecord,
} from "../domain/types.js";

const schemaRecordSchema = z.object({
  table_name: z.string().min(1),
  columns_names: z.array(z.string()),
  content: z.string().optional(),
  table_schema: z.string().optional(),
  chunk_type: z.enum(CHUNK_TYPES).optional(),
  chunk_order: z.number().int().positive().optional(),
});

export type SchemaRecordInput = SchemaChunkRecord | WholeSchemaRecord;

/**
 * Maps chunk records (or whole-schema records) to content + metadata
 * documents, one per record, in input order.
 */
export function buildSchemaDocuments(
  records: readonly (SchemaRecordInput | Record<string, unknown>)[],
): SchemaDocument[] {
  return records.map((record, index) => buildSchemaDocument(record, index));
}

export function buildSchemaDocument(
  record: SchemaRecordInput | Record<string, unknown>,
  index = 0,
): SchemaDocument {
  const parsed = schemaRecordSchema.safeParse(record);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new MalformedRecordError(String(issue?.path[0] ?? "record"), index, issue?.message);
  }

  const { data } = parsed;
  const content = data.content ?? data.table_schema;
  if (content === undefined) {
    throw new MalformedRecordError("content", index);
  }

  const metadata: SchemaDocumentMetadata = {
    table_name: data.table_name,
    columns: [...data.columns_names],
    source: SCHEMA_DOCUMENT_SOURCE,
  };
  if (data.chunk_type !== undefined) {
    metadata.chunk_type = data.chunk_type;
  }
  if (data.chunk_order !== undefined) {
    metadata.chunk_order = data.chunk_order;
  }

  return { pageContent: content.trim(), metadata };
}
