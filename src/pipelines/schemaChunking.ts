import {
  ChunkType,
  NO_DESCRIPTION,
  SchemaChunk,
  SchemaChunkRecord,
  TableSchema,
} from "../domain/types.js";
import { detectBlocks } from "./blockDetection.js";
import { splitTextRecursively } from "./recursiveSplitter.js";

export interface SchemaChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
}

export const DEFAULT_SCHEMA_CHUNK_OPTIONS: Readonly<SchemaChunkOptions> = {
  chunkSize: 800,
  chunkOverlap: 0,
};

/** Chunk size used when every table of a database is chunked in one go. */
export const BULK_SCHEMA_CHUNK_SIZE = 400;

const CHUNK_LABELS: Record<ChunkType, string> = {
  description: "DESCRIPTION:\n",
  schema: "SCHEMA:\n",
  columns: "COLUMN DESCRIPTIONS:\n",
  samples: "SAMPLE DATA:\n",
  general: "",
};

export function fullSchema(schema: TableSchema): string {
  return `TABLE: ${schema.tableName}\n\nDESCRIPTION: ${schema.tableComment}\n\n${schema.rawTableInfo}`;
}

export function hasTableDescription(schema: TableSchema): boolean {
  const comment = schema.tableComment.trim();
  return comment.length > 0 && comment !== NO_DESCRIPTION;
}

/**
 * Chunks one table: an optional description chunk, then the size-bounded
 * parts of every detected block. `chunkOrder` runs 1..N across the table.
 */
export function chunkTableSchema(
  schema: TableSchema,
  options: SchemaChunkOptions = DEFAULT_SCHEMA_CHUNK_OPTIONS,
): SchemaChunk[] {
  const chunks: SchemaChunk[] = [];

  const push = (chunkType: ChunkType, body: string) => {
    chunks.push({
      tableName: schema.tableName,
      columnsNames: schema.columnsNames,
      content: formatChunkContent(schema.tableName, body, chunkType),
      chunkType,
      chunkOrder: chunks.length + 1,
    });
  };

  if (hasTableDescription(schema)) {
    push("description", schema.tableComment);
  }

  for (const block of detectBlocks(schema.rawTableInfo)) {
    const parts = splitTextRecursively(block.text, {
      chunkSize: options.chunkSize,
      chunkOverlap: options.chunkOverlap,
    });

    for (const part of parts) {
      if (part.trim()) {
        push(block.type, part);
      }
    }
  }

  return chunks;
}

export function chunkSchemas(
  schemas: readonly TableSchema[],
  options: SchemaChunkOptions = DEFAULT_SCHEMA_CHUNK_OPTIONS,
): SchemaChunk[] {
  return schemas.flatMap((schema) => chunkTableSchema(schema, options));
}

export function formatChunkContent(
  tableName: string,
  body: string,
  chunkType: ChunkType,
): string {
  return `TABLE: ${tableName}\n\n${CHUNK_LABELS[chunkType]}${body.trim()}`;
}

export function toChunkRecord(chunk: SchemaChunk): SchemaChunkRecord {
  return {
    table_name: chunk.tableName,
    columns_names: [...chunk.columnsNames],
    content: chunk.content,
    chunk_type: chunk.chunkType,
    chunk_order: chunk.chunkOrder,
  };
}
