import {
  IndexedTableRecord,
  SchemaDocumentMetadata,
  SearchResult,
} from "./types.js";

export interface IndexedDocumentInput {
  index: number;
  text: string;
  metadata: SchemaDocumentMetadata;
  embedding: number[] | null;
}

export interface UpsertTableInput {
  tableName: string;
  documents: IndexedDocumentInput[];
}

export interface SearchInput {
  query: string;
  queryEmbedding: number[] | null;
  topK: number;
  tableNames?: string[];
}

export interface ClearResult {
  cleared_tables: number;
  cleared_chunks: number;
}

export interface KnowledgeBase {
  upsertTable(input: UpsertTableInput): Promise<IndexedTableRecord>;
  listTables(): Promise<IndexedTableRecord[]>;
  search(input: SearchInput): Promise<SearchResult[]>;
  clear(): Promise<ClearResult>;
}
