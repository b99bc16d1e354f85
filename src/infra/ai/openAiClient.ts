import { z } from "zod";
import { EmbeddingClient } from "./types.js";

const OPENAI_EMBEDDINGS_URL = "https://api.openai.com/v1/embeddings";

// OpenAI caps a single embeddings request at 2048 inputs.
const MAX_INPUTS_PER_REQUEST = 2048;

interface OpenAiEmbeddingClientOptions {
  apiKey: string | null;
  embeddingModel: string;
  fetchImpl?: typeof fetch;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int(),
    }),
  ),
});

export class OpenAiEmbeddingClient implements EmbeddingClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: OpenAiEmbeddingClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  isConfigured(): boolean {
    return Boolean(this.options.apiKey);
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const embeddings: number[][] = [];
    for (let start = 0; start < texts.length; start += MAX_INPUTS_PER_REQUEST) {
      embeddings.push(
        ...(await this.requestEmbeddings(texts.slice(start, start + MAX_INPUTS_PER_REQUEST))),
      );
    }
    return embeddings;
  }

  async embedQuery(query: string): Promise<number[]> {
    const [embedding] = await this.embedTexts([query]);
    if (!embedding) {
      throw new Error("OpenAI embeddings returned no vector for the query.");
    }
    return embedding;
  }

  private async requestEmbeddings(texts: string[]): Promise<number[][]> {
    const apiKey = this.requireApiKey();

    const response = await this.fetchImpl(OPENAI_EMBEDDINGS_URL, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.embeddingModel,
        input: texts,
      }),
    });

    if (!response.ok) {
      throw new Error(
        `OpenAI embeddings failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = embeddingResponseSchema.parse(await response.json());
    if (data.data.length !== texts.length) {
      throw new Error("Embedding count mismatch.");
    }
    return data.data
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }

  private requireApiKey(): string {
    if (!this.options.apiKey) {
      throw new Error("OPENAI_API_KEY is required for OpenAI operations.");
    }
    return this.options.apiKey;
  }
}
