import {
  ClearResult,
  KnowledgeBase,
  SearchInput,
  UpsertTableInput,
} from "../../domain/knowledgeBase.js";
import {
  ChunkRecord,
  IndexedTableRecord,
  SearchResult,
  TableChunkRecord,
} from "../../domain/types.js";
import {
  isBroadQueryIntent,
  scoreByTokenOverlap,
  tokenize,
  tokenizeForBm25,
} from "../../utils/text.js";
import { createTableId } from "../../utils/ids.js";
import { cosineSimilarity } from "../../utils/vector.js";

export interface InMemoryKnowledgeBaseSnapshot {
  tables: IndexedTableRecord[];
  chunksByTableId: Record<string, ChunkRecord[]>;
}

interface Bm25Document {
  table: IndexedTableRecord;
  chunk: ChunkRecord;
  tf: Map<string, number>;
  uniqueTokens: string[];
  docLength: number;
}

interface Bm25Corpus {
  documents: Bm25Document[];
  docFreq: Map<string, number>;
  avgDocLength: number;
}

export class InMemoryKnowledgeBase implements KnowledgeBase {
  protected tableByName = new Map<string, IndexedTableRecord>();

  protected chunksByTableId = new Map<string, ChunkRecord[]>();

  private bm25DocsByTableId = new Map<string, Bm25Document[]>();

  private bm25CorpusCache: Bm25Corpus | null = null;

  async upsertTable({ tableName, documents }: UpsertTableInput): Promise<IndexedTableRecord> {
    const table: IndexedTableRecord = {
      id: createTableId(tableName),
      tableName,
      indexedAt: new Date().toISOString(),
      chunkCount: documents.length,
    };

    const persistedChunks: ChunkRecord[] = documents.map((document) => ({
      id: `${table.id}:${document.index}`,
      tableId: table.id,
      index: document.index,
      text: document.text,
      metadata: { ...document.metadata, columns: [...document.metadata.columns] },
      embedding: document.embedding,
    }));

    this.tableByName.set(tableName, table);
    this.chunksByTableId.set(table.id, persistedChunks);
    this.bm25DocsByTableId.set(table.id, this.buildBm25DocumentsForTable(table, persistedChunks));
    this.bm25CorpusCache = null;

    return table;
  }

  async listTables(): Promise<IndexedTableRecord[]> {
    return [...this.tableByName.values()].sort((a, b) =>
      a.tableName.localeCompare(b.tableName),
    );
  }

  async clear(): Promise<ClearResult> {
    const clearedTables = this.tableByName.size;
    let clearedChunks = 0;
    for (const chunks of this.chunksByTableId.values()) {
      clearedChunks += chunks.length;
    }

    this.tableByName.clear();
    this.chunksByTableId.clear();
    this.bm25DocsByTableId.clear();
    this.bm25CorpusCache = null;
    return { cleared_tables: clearedTables, cleared_chunks: clearedChunks };
  }

  async search(input: SearchInput): Promise<SearchResult[]> {
    const allowedTableIds = this.resolveAllowedTableIds(input.tableNames);

    if (input.queryEmbedding) {
      const hybridResults = this.searchByHybrid(
        input.query,
        input.queryEmbedding,
        input.topK,
        allowedTableIds,
      );
      if (hybridResults.length > 0) {
        return hybridResults;
      }
    }

    const bm25Results = this.searchByBm25(input.query, input.topK, allowedTableIds);
    if (bm25Results.length > 0) {
      return bm25Results;
    }

    const lexicalResults = this.searchByLexical(input.query, input.topK, allowedTableIds);
    if (lexicalResults.length > 0) {
      return lexicalResults;
    }

    if (isBroadQueryIntent(input.query)) {
      return this.buildBroadIntentFallback(input.topK, allowedTableIds);
    }

    return [];
  }

  protected exportSnapshot(): InMemoryKnowledgeBaseSnapshot {
    const tables = [...this.tableByName.values()].sort((a, b) =>
      a.tableName.localeCompare(b.tableName),
    );

    const chunksByTableId: Record<string, ChunkRecord[]> = {};
    for (const [tableId, chunks] of this.chunksByTableId.entries()) {
      chunksByTableId[tableId] = chunks.map((chunk) => ({ ...chunk }));
    }

    return { tables, chunksByTableId };
  }

  protected importSnapshot(snapshot: InMemoryKnowledgeBaseSnapshot): void {
    this.tableByName.clear();
    this.chunksByTableId.clear();
    this.bm25DocsByTableId.clear();
    this.bm25CorpusCache = null;

    for (const table of snapshot.tables) {
      this.tableByName.set(table.tableName, { ...table });
    }

    for (const [tableId, chunks] of Object.entries(snapshot.chunksByTableId)) {
      this.chunksByTableId.set(
        tableId,
        chunks.map((chunk) => ({ ...chunk })),
      );
    }

    for (const table of this.tableByName.values()) {
      const chunks = this.chunksByTableId.get(table.id) ?? [];
      this.bm25DocsByTableId.set(table.id, this.buildBm25DocumentsForTable(table, chunks));
    }
  }

  private searchBySemantic(
    queryEmbedding: number[],
    topK: number,
    allowedTableIds: Set<string> | null,
  ): SearchResult[] {
    const candidates: SearchResult[] = [];

    for (const { table, chunk } of this.iterateChunks(allowedTableIds)) {
      if (!chunk.embedding) {
        continue;
      }
      const score = cosineSimilarity(queryEmbedding, chunk.embedding);
      if (score <= 0) {
        continue;
      }
      candidates.push({ chunk, table, score });
    }

    return candidates.sort((a, b) => b.score - a.score).slice(0, topK);
  }

  private searchByHybrid(
    query: string,
    queryEmbedding: number[],
    topK: number,
    allowedTableIds: Set<string> | null,
  ): SearchResult[] {
    const semantic = this.searchBySemantic(queryEmbedding, Math.max(topK, 24), allowedTableIds);
    const bm25 = this.searchByBm25(query, Math.max(topK, 24), allowedTableIds);

    if (semantic.length === 0) {
      return bm25.slice(0, topK);
    }
    if (bm25.length === 0) {
      return semantic.slice(0, topK);
    }

    return fuseByReciprocalRank(semantic, bm25, topK);
  }

  private searchByBm25(
    query: string,
    topK: number,
    allowedTableIds: Set<string> | null,
  ): SearchResult[] {
    const queryTokens = tokenize(query);
    if (queryTokens.length === 0) {
      return [];
    }

    const corpus = this.resolveBm25Corpus(allowedTableIds);
    if (corpus.documents.length === 0) {
      return [];
    }

    const k1 = 1.2;
    const b = 0.75;

    const scored: SearchResult[] = [];
    for (const doc of corpus.documents) {
      let score = 0;
      for (const term of queryTokens) {
        const tf = doc.tf.get(term) ?? 0;
        if (tf <= 0) {
          continue;
        }
        const df = corpus.docFreq.get(term) ?? 0;
        const idf = Math.log(1 + (corpus.documents.length - df + 0.5) / (df + 0.5));
        const numerator = tf * (k1 + 1);
        const denominator =
          tf + k1 * (1 - b + b * (doc.docLength / Math.max(corpus.avgDocLength, 1e-9)));
        score += idf * (numerator / Math.max(denominator, 1e-9));
      }

      if (score > 0) {
        scored.push({ table: doc.table, chunk: doc.chunk, score });
      }
    }

    return scored.sort((a, b) => b.score - a.score).slice(0, topK);
  }

  private searchByLexical(
    query: string,
    topK: number,
    allowedTableIds: Set<string> | null,
  ): SearchResult[] {
    const candidates: SearchResult[] = [];
    for (const { table, chunk } of this.iterateChunks(allowedTableIds)) {
      const score = scoreByTokenOverlap(query, chunk.text);
      if (score <= 0) {
        continue;
      }
      candidates.push({ chunk, table, score });
    }

    return candidates.sort((a, b) => b.score - a.score).slice(0, topK);
  }

  private buildBm25DocumentsForTable(
    table: IndexedTableRecord,
    chunks: ChunkRecord[],
  ): Bm25Document[] {
    const docs: Bm25Document[] = [];

    for (const chunk of chunks) {
      const tokens = tokenizeForBm25(chunk.text);
      if (tokens.length === 0) {
        continue;
      }

      const tf = new Map<string, number>();
      for (const token of tokens) {
        tf.set(token, (tf.get(token) ?? 0) + 1);
      }

      docs.push({
        table,
        chunk,
        tf,
        uniqueTokens: [...new Set(tokens)],
        docLength: tokens.length,
      });
    }

    return docs;
  }

  private resolveBm25Corpus(allowedTableIds: Set<string> | null): Bm25Corpus {
    if (!allowedTableIds) {
      if (!this.bm25CorpusCache) {
        this.bm25CorpusCache = buildBm25Corpus([...this.bm25DocsByTableId.values()].flat());
      }
      return this.bm25CorpusCache;
    }

    const documents: Bm25Document[] = [];
    for (const tableId of allowedTableIds) {
      documents.push(...(this.bm25DocsByTableId.get(tableId) ?? []));
    }
    return buildBm25Corpus(documents);
  }

  private *iterateChunks(allowedTableIds: Set<string> | null): Generator<TableChunkRecord> {
    for (const table of this.tableByName.values()) {
      if (allowedTableIds && !allowedTableIds.has(table.id)) {
        continue;
      }
      for (const chunk of this.chunksByTableId.get(table.id) ?? []) {
        yield { table, chunk };
      }
    }
  }

  private resolveAllowedTableIds(tableNames?: string[]): Set<string> | null {
    if (!tableNames || tableNames.length === 0) {
      return null;
    }

    const ids = new Set<string>();
    for (const name of tableNames) {
      const table = this.tableByName.get(name);
      if (table) {
        ids.add(table.id);
      }
    }
    return ids;
  }

  private buildBroadIntentFallback(
    topK: number,
    allowedTableIds: Set<string> | null,
  ): SearchResult[] {
    const tables = [...this.tableByName.values()]
      .filter((table) => !allowedTableIds || allowedTableIds.has(table.id))
      .sort((a, b) => a.tableName.localeCompare(b.tableName));

    const fallback: SearchResult[] = [];
    for (const table of tables) {
      const chunks = [...(this.chunksByTableId.get(table.id) ?? [])].sort(
        (a, b) => a.index - b.index,
      );
      const first = chunks[0];
      if (!first) {
        continue;
      }
      fallback.push({ table, chunk: first, score: 0.0001 });
      if (fallback.length >= topK) {
        break;
      }
    }

    return fallback;
  }
}

function buildBm25Corpus(documents: Bm25Document[]): Bm25Corpus {
  if (documents.length === 0) {
    return { documents: [], docFreq: new Map<string, number>(), avgDocLength: 0 };
  }

  const docFreq = new Map<string, number>();
  let totalDocLength = 0;
  for (const doc of documents) {
    totalDocLength += doc.docLength;
    for (const token of doc.uniqueTokens) {
      docFreq.set(token, (docFreq.get(token) ?? 0) + 1);
    }
  }

  return { documents, docFreq, avgDocLength: totalDocLength / documents.length };
}

function fuseByReciprocalRank(
  semantic: SearchResult[],
  bm25: SearchResult[],
  topK: number,
): SearchResult[] {
  const fused = new Map<string, SearchResult>();
  const rrfK = 60;

  const accumulate = (results: SearchResult[], weight: number) => {
    results.forEach((item, rank) => {
      const prev = fused.get(item.chunk.id) ?? { table: item.table, chunk: item.chunk, score: 0 };
      prev.score += weight / (rrfK + rank + 1);
      fused.set(item.chunk.id, prev);
    });
  };

  accumulate(semantic, 1);
  accumulate(bm25, 1.05);

  return [...fused.values()].sort((a, b) => b.score - a.score).slice(0, topK);
}
