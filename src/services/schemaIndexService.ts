import { ClearResult, KnowledgeBase } from "../domain/knowledgeBase.js";
import {
  ChunkType,
  IndexedTableRecord,
  SchemaChunkRecord,
  SchemaDocument,
  TableSchema,
} from "../domain/types.js";
import { EmbeddingClient } from "../infra/ai/types.js";
import { getLogger } from "../infra/logging/logger.js";
import { buildSchemaDocuments } from "../pipelines/documentBuilding.js";
import {
  BULK_SCHEMA_CHUNK_SIZE,
  chunkSchemas,
  chunkTableSchema,
  DEFAULT_SCHEMA_CHUNK_OPTIONS,
  SchemaChunkOptions,
  toChunkRecord,
} from "../pipelines/schemaChunking.js";
import { SchemaExtractor, toWholeSchemaRecord } from "./schemaExtractor.js";

const logger = getLogger("schema-index");

export interface IndexSchemasResult {
  indexed_tables: string[];
  chunk_count: number;
  embedding_enabled: boolean;
}

export interface SearchSchemaInput {
  query: string;
  topK?: number;
  tableNames?: string[];
}

export interface SearchSchemaResult {
  query: string;
  retrieval_mode: "semantic" | "lexical";
  hits: Array<{
    score: number;
    table_name: string;
    chunk_type: ChunkType | null;
    chunk_order: number | null;
    chunk_id: string;
    content: string;
  }>;
}

export interface IndexedTablesResult {
  tables: Array<{
    table_name: string;
    chunk_count: number;
    indexed_at: string;
  }>;
}

export class SchemaIndexService {
  private readonly chunkOptions: SchemaChunkOptions;

  constructor(
    private readonly extractor: SchemaExtractor,
    private readonly knowledgeBase: KnowledgeBase,
    private readonly embeddings: EmbeddingClient,
    chunkOptions: SchemaChunkOptions = DEFAULT_SCHEMA_CHUNK_OPTIONS,
  ) {
    this.chunkOptions = { ...chunkOptions };
  }

  /** Chunks of every usable table, at the bulk chunk size. */
  async getSchemaChunks(): Promise<SchemaChunkRecord[]> {
    const schemas = await this.extractor.extractSchemas();
    return chunkSchemas(schemas, {
      chunkSize: BULK_SCHEMA_CHUNK_SIZE,
      chunkOverlap: this.chunkOptions.chunkOverlap,
    }).map(toChunkRecord);
  }

  async getTableChunks(tableName: string): Promise<SchemaChunkRecord[]> {
    const schemas = await this.extractor.extractSchemas([tableName]);
    return chunkSchemas(schemas, this.chunkOptions).map(toChunkRecord);
  }

  /** Unchunked documents, one per table. */
  async getSchemaDocuments(tableNames?: string[]): Promise<SchemaDocument[]> {
    const schemas = await this.extractor.extractSchemas(tableNames);
    return buildSchemaDocuments(schemas.map(toWholeSchemaRecord));
  }

  async indexSchemas(tableNames?: string[]): Promise<IndexSchemasResult> {
    const schemas = await this.extractor.extractSchemas(tableNames);
    const indexedTables: string[] = [];
    let chunkCount = 0;

    for (const schema of schemas) {
      const saved = await this.indexTableSchema(schema);
      indexedTables.push(saved.tableName);
      chunkCount += saved.chunkCount;
    }

    logger.info("Indexed table schemas", {
      tables: indexedTables.length,
      chunks: chunkCount,
    });

    return {
      indexed_tables: indexedTables,
      chunk_count: chunkCount,
      embedding_enabled: this.embeddings.isConfigured(),
    };
  }

  async searchSchema(input: SearchSchemaInput): Promise<SearchSchemaResult> {
    const queryEmbedding = this.embeddings.isConfigured()
      ? await this.embeddings.embedQuery(input.query)
      : null;

    const hits = await this.knowledgeBase.search({
      query: input.query,
      queryEmbedding,
      topK: input.topK ?? 5,
      tableNames: input.tableNames,
    });

    return {
      query: input.query,
      retrieval_mode: queryEmbedding ? "semantic" : "lexical",
      hits: hits.map((hit) => ({
        score: Number(hit.score.toFixed(4)),
        table_name: hit.table.tableName,
        chunk_type: hit.chunk.metadata.chunk_type ?? null,
        chunk_order: hit.chunk.metadata.chunk_order ?? null,
        chunk_id: hit.chunk.id,
        content: hit.chunk.text,
      })),
    };
  }

  async listIndexedTables(): Promise<IndexedTablesResult> {
    const tables = await this.knowledgeBase.listTables();
    return {
      tables: tables.map((table) => ({
        table_name: table.tableName,
        chunk_count: table.chunkCount,
        indexed_at: table.indexedAt,
      })),
    };
  }

  async resetIndex(): Promise<ClearResult> {
    const cleared = await this.knowledgeBase.clear();
    logger.info("Cleared schema index", { ...cleared });
    return cleared;
  }

  private async indexTableSchema(schema: TableSchema): Promise<IndexedTableRecord> {
    const chunks = chunkTableSchema(schema, this.chunkOptions);
    const documents = buildSchemaDocuments(chunks.map(toChunkRecord));
    const embeddings = this.embeddings.isConfigured()
      ? await this.embeddings.embedTexts(documents.map((document) => document.pageContent))
      : [];

    if (embeddings.length > 0 && embeddings.length !== documents.length) {
      throw new Error(`Embedding count mismatch for table ${schema.tableName}.`);
    }

    logger.debug("Indexing table", { table: schema.tableName, chunks: documents.length });
    return this.knowledgeBase.upsertTable({
      tableName: schema.tableName,
      documents: documents.map((document, index) => ({
        index,
        text: document.pageContent,
        metadata: document.metadata,
        embedding: embeddings[index] ?? null,
      })),
    });
  }
}
