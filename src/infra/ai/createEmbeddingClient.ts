import { AppConfig } from "../../config/env.js";
import { OpenAiEmbeddingClient } from "./openAiClient.js";
import { EmbeddingClient } from "./types.js";

export class DisabledEmbeddingClient implements EmbeddingClient {
  isConfigured(): boolean {
    return false;
  }

  async embedTexts(): Promise<number[][]> {
    return [];
  }

  async embedQuery(): Promise<number[]> {
    throw new Error("Embedding provider is disabled.");
  }
}

export function createEmbeddingClient(config: AppConfig): EmbeddingClient {
  if (config.embeddingProvider === "none") {
    return new DisabledEmbeddingClient();
  }
  return new OpenAiEmbeddingClient({
    apiKey: config.openaiApiKey,
    embeddingModel: config.embeddingModel,
  });
}
