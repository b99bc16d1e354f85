import { Pool } from "pg";
import {
  ClearResult,
  KnowledgeBase,
  SearchInput,
  UpsertTableInput,
} from "../../domain/knowledgeBase.js";
import {
  IndexedTableRecord,
  SchemaDocumentMetadata,
  SearchResult,
  TableChunkRecord,
} from "../../domain/types.js";
import { createTableId } from "../../utils/ids.js";
import { toVectorLiteral } from "../../utils/vector.js";

interface PgTableChunkRow {
  chunk_id: string;
  table_id: string;
  chunk_index: number;
  content: string;
  metadata: SchemaDocumentMetadata;
  table_name: string;
  indexed_at: Date;
  chunk_count: number;
}

interface PgScoredChunkRow extends PgTableChunkRow {
  score: number;
}

export class PgVectorKnowledgeBase implements KnowledgeBase {
  private initialized = false;

  constructor(
    private readonly pool: Pool,
    private readonly vectorDimension: number,
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.pool.query(`CREATE EXTENSION IF NOT EXISTS vector`);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS schema_tables (
        id TEXT PRIMARY KEY,
        table_name TEXT NOT NULL UNIQUE,
        indexed_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        chunk_count INTEGER NOT NULL
      )
    `);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS schema_chunks (
        id TEXT PRIMARY KEY,
        table_id TEXT NOT NULL REFERENCES schema_tables(id) ON DELETE CASCADE,
        chunk_index INTEGER NOT NULL,
        content TEXT NOT NULL,
        metadata JSONB NOT NULL,
        embedding VECTOR(${this.vectorDimension}) NOT NULL
      )
    `);
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_schema_chunks_table_id ON schema_chunks(table_id)`,
    );
    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS idx_schema_chunks_embedding
      ON schema_chunks USING ivfflat (embedding vector_cosine_ops)
      WITH (lists = 100)
    `);

    this.initialized = true;
  }

  async upsertTable(input: UpsertTableInput): Promise<IndexedTableRecord> {
    await this.initialize();

    const tableId = createTableId(input.tableName);
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");

      const tableResult = await client.query<{
        id: string;
        indexed_at: Date;
        chunk_count: number;
      }>(
        `
          INSERT INTO schema_tables (id, table_name, indexed_at, chunk_count)
          VALUES ($1, $2, NOW(), $3)
          ON CONFLICT (table_name)
          DO UPDATE SET indexed_at = NOW(), chunk_count = EXCLUDED.chunk_count
          RETURNING id, indexed_at, chunk_count
        `,
        [tableId, input.tableName, input.documents.length],
      );

      const persisted = tableResult.rows[0];
      await client.query(`DELETE FROM schema_chunks WHERE table_id = $1`, [persisted.id]);

      for (const document of input.documents) {
        if (!document.embedding) {
          throw new Error("Missing embedding for pgvector upsert. Configure OPENAI_API_KEY.");
        }

        await client.query(
          `
            INSERT INTO schema_chunks (id, table_id, chunk_index, content, metadata, embedding)
            VALUES ($1, $2, $3, $4, $5::jsonb, $6::vector)
          `,
          [
            `${persisted.id}:${document.index}`,
            persisted.id,
            document.index,
            document.text,
            JSON.stringify(document.metadata),
            toVectorLiteral(document.embedding),
          ],
        );
      }

      await client.query("COMMIT");

      return {
        id: persisted.id,
        tableName: input.tableName,
        indexedAt: persisted.indexed_at.toISOString(),
        chunkCount: persisted.chunk_count,
      };
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async listTables(): Promise<IndexedTableRecord[]> {
    await this.initialize();
    const result = await this.pool.query<{
      id: string;
      table_name: string;
      indexed_at: Date;
      chunk_count: number;
    }>(`SELECT id, table_name, indexed_at, chunk_count FROM schema_tables ORDER BY table_name ASC`);

    return result.rows.map((row) => ({
      id: row.id,
      tableName: row.table_name,
      indexedAt: row.indexed_at.toISOString(),
      chunkCount: row.chunk_count,
    }));
  }

  async search(input: SearchInput): Promise<SearchResult[]> {
    await this.initialize();
    if (!input.queryEmbedding) {
      throw new Error(
        "Query embedding is required for pgvector search. Configure OPENAI_API_KEY.",
      );
    }

    const result = await this.pool.query<PgScoredChunkRow>(
      `
        SELECT
          c.id AS chunk_id,
          c.table_id,
          c.chunk_index,
          c.content,
          c.metadata,
          t.table_name,
          t.indexed_at,
          t.chunk_count,
          (1 - (c.embedding <=> $1::vector)) AS score
        FROM schema_chunks c
        JOIN schema_tables t ON t.id = c.table_id
        WHERE ($2::text[] IS NULL OR t.table_name = ANY($2::text[]))
        ORDER BY c.embedding <=> $1::vector
        LIMIT $3
      `,
      [
        toVectorLiteral(input.queryEmbedding),
        input.tableNames?.length ? input.tableNames : null,
        input.topK,
      ],
    );

    return result.rows.map((row) => ({ ...toTableChunk(row), score: Number(row.score) }));
  }

  async clear(): Promise<ClearResult> {
    await this.initialize();
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");

      const tableCount = await client.query<{ count: string }>(
        "SELECT COUNT(*)::text AS count FROM schema_tables",
      );
      const chunkCount = await client.query<{ count: string }>(
        "SELECT COUNT(*)::text AS count FROM schema_chunks",
      );

      await client.query("TRUNCATE TABLE schema_chunks, schema_tables");
      await client.query("COMMIT");

      return {
        cleared_tables: Number(tableCount.rows[0]?.count ?? 0),
        cleared_chunks: Number(chunkCount.rows[0]?.count ?? 0),
      };
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }
}

function toTableChunk(row: PgTableChunkRow): TableChunkRecord {
  return {
    table: {
      id: row.table_id,
      tableName: row.table_name,
      indexedAt: row.indexed_at.toISOString(),
      chunkCount: row.chunk_count,
    },
    chunk: {
      id: row.chunk_id,
      tableId: row.table_id,
      index: row.chunk_index,
      text: row.content,
      metadata: row.metadata,
    },
  };
}
