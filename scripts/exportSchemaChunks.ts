import "dotenv/config";
import { loadConfig, requireDatabaseUrl } from "../src/config/env.js";
import { SchemaChunkRecord } from "../src/domain/types.js";
import { DisabledEmbeddingClient } from "../src/infra/ai/createEmbeddingClient.js";
import { createPostgresPool } from "../src/infra/db/postgres.js";
import { getLogger, setupLogging } from "../src/infra/logging/logger.js";
import { PostgresSchemaSource } from "../src/infra/schema/postgresSchemaSource.js";
import { InMemoryKnowledgeBase } from "../src/infra/store/inMemoryKnowledgeBase.js";
import { SchemaExtractor } from "../src/services/schemaExtractor.js";
import { SchemaIndexService } from "../src/services/schemaIndexService.js";

const logger = getLogger("export-schema-chunks");

// Usage: tsx scripts/exportSchemaChunks.ts [table ...]
async function main() {
  const config = loadConfig();
  setupLogging({
    level: config.logLevel,
    useColors: config.logColors,
    showTimestamps: config.logTimestamps,
  });

  const tables = process.argv.slice(2);
  const pool = createPostgresPool(requireDatabaseUrl(config));
  try {
    const service = new SchemaIndexService(
      new SchemaExtractor(
        new PostgresSchemaSource(pool, {
          schema: config.dbSchema,
          sampleRowsInTableInfo: config.sampleRowsInTableInfo,
          includeTables: config.includeTables,
          ignoreTables: config.ignoreTables,
        }),
      ),
      new InMemoryKnowledgeBase(),
      new DisabledEmbeddingClient(),
      { chunkSize: config.chunkSize, chunkOverlap: config.chunkOverlap },
    );

    const chunks: SchemaChunkRecord[] = [];
    if (tables.length === 0) {
      chunks.push(...(await service.getSchemaChunks()));
    }
    for (const table of tables) {
      chunks.push(...(await service.getTableChunks(table)));
    }

    process.stdout.write(`${JSON.stringify(chunks, null, 2)}\n`);
    logger.info("Exported schema chunks", { chunks: chunks.length });
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  logger.error("Chunk export failed", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
