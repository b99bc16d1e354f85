export const NO_DESCRIPTION = "No description";

export const SCHEMA_DOCUMENT_SOURCE = "database_schema";

export const CHUNK_TYPES = [
  "description",
  "schema",
  "columns",
  "samples",
  "general",
] as const;

export type ChunkType = (typeof CHUNK_TYPES)[number];

export type BlockType = Exclude<ChunkType, "description">;

export interface TableSchema {
  readonly tableName: string;
  readonly columnsNames: readonly string[];
  readonly rawTableInfo: string;
  readonly tableComment: string;
}

export interface SchemaChunk {
  readonly tableName: string;
  readonly columnsNames: readonly string[];
  readonly content: string;
  readonly chunkType: ChunkType;
  readonly chunkOrder: number;
}

export interface Block {
  text: string;
  type: BlockType;
}

/** Mapping form of a {@link SchemaChunk}, as handed to the document builder. */
export interface SchemaChunkRecord {
  table_name: string;
  columns_names: string[];
  content: string;
  chunk_type: ChunkType;
  chunk_order: number;
}

/** Mapping form of a whole, unsplit table schema. */
export interface WholeSchemaRecord {
  table_name: string;
  columns_names: string[];
  table_schema: string;
}

export interface SchemaDocumentMetadata {
  table_name: string;
  columns: string[];
  source: typeof SCHEMA_DOCUMENT_SOURCE;
  chunk_type?: ChunkType;
  chunk_order?: number;
}

export interface SchemaDocument {
  pageContent: string;
  metadata: SchemaDocumentMetadata;
}

export interface IndexedTableRecord {
  id: string;
  tableName: string;
  indexedAt: string;
  chunkCount: number;
}

export interface ChunkRecord {
  id: string;
  tableId: string;
  index: number;
  text: string;
  metadata: SchemaDocumentMetadata;
  embedding?: number[] | null;
}

export interface SearchResult {
  chunk: ChunkRecord;
  table: IndexedTableRecord;
  score: number;
}

export interface TableChunkRecord {
  table: IndexedTableRecord;
  chunk: ChunkRecord;
}
