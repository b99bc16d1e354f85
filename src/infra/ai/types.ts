export interface EmbeddingClient {
  isConfigured(): boolean;
  embedTexts(texts: string[]): Promise<number[][]>;
  embedQuery(query: string): Promise<number[]>;
}
