import { AppConfig } from "../../config/env.js";
import { ConfigError } from "../../domain/errors.js";
import { KnowledgeBase } from "../../domain/knowledgeBase.js";
import { createPostgresPool } from "../db/postgres.js";
import { InMemoryKnowledgeBase } from "./inMemoryKnowledgeBase.js";
import { PersistentInMemoryKnowledgeBase } from "./persistentInMemoryKnowledgeBase.js";
import { PgVectorKnowledgeBase } from "./pgVectorKnowledgeBase.js";

export interface KnowledgeBaseBootstrapResult {
  knowledgeBase: KnowledgeBase;
  close: () => Promise<void>;
}

export async function createKnowledgeBase(
  config: AppConfig,
): Promise<KnowledgeBaseBootstrapResult> {
  if (!config.enablePgvector) {
    if (config.persistIndex) {
      const knowledgeBase = new PersistentInMemoryKnowledgeBase(config.indexPath, {
        maxBytes: config.maxIndexBytes,
      });
      await knowledgeBase.initialize();
      return {
        knowledgeBase,
        close: async () => {
          await knowledgeBase.close();
        },
      };
    }

    return {
      knowledgeBase: new InMemoryKnowledgeBase(),
      close: async () => {},
    };
  }

  if (!config.vectorDatabaseUrl) {
    throw new ConfigError("VECTOR_DATABASE_URL is required when pgvector is enabled.");
  }

  const pool = createPostgresPool(config.vectorDatabaseUrl);
  const knowledgeBase = new PgVectorKnowledgeBase(pool, config.vectorDimension);
  await knowledgeBase.initialize();

  return {
    knowledgeBase,
    close: async () => {
      await pool.end();
    },
  };
}
