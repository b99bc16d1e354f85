import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ClearResult, SearchInput, UpsertTableInput } from "../../domain/knowledgeBase.js";
import {
  CHUNK_TYPES,
  IndexedTableRecord,
  SCHEMA_DOCUMENT_SOURCE,
  SearchResult,
} from "../../domain/types.js";
import { InMemoryKnowledgeBase, InMemoryKnowledgeBaseSnapshot } from "./inMemoryKnowledgeBase.js";

const CURRENT_FORMAT_VERSION = 1;

const tableRecordSchema = z.object({
  id: z.string(),
  tableName: z.string(),
  indexedAt: z.string(),
  chunkCount: z.number().int().min(0),
});

const chunkRecordSchema = z.object({
  id: z.string(),
  tableId: z.string(),
  index: z.number().int(),
  text: z.string(),
  metadata: z.object({
    table_name: z.string(),
    columns: z.array(z.string()),
    source: z.literal(SCHEMA_DOCUMENT_SOURCE),
    chunk_type: z.enum(CHUNK_TYPES).optional(),
    chunk_order: z.number().int().positive().optional(),
  }),
  embedding: z.array(z.number()).nullable().optional(),
});

const persistedIndexSchema = z.object({
  format_version: z.number().int(),
  saved_at: z.string(),
  snapshot: z.object({
    tables: z.array(tableRecordSchema),
    chunksByTableId: z.record(z.array(chunkRecordSchema)),
  }),
});

type PersistedIndex = z.infer<typeof persistedIndexSchema>;

export interface PersistentInMemoryOptions {
  maxBytes: number;
}

/**
 * In-memory index mirrored to a JSON file after every mutation.
 * Writes are serialized and land through a temp file + rename. A mutation
 * whose write fails is rolled back, so memory and file stay in step.
 */
export class PersistentInMemoryKnowledgeBase extends InMemoryKnowledgeBase {
  private initialized = false;

  private writeChain: Promise<void> = Promise.resolve();

  private readonly absolutePath: string;

  constructor(
    filePath: string,
    private readonly options: PersistentInMemoryOptions,
  ) {
    super();
    this.absolutePath = path.resolve(filePath);
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });

    try {
      const raw = await fs.readFile(this.absolutePath, "utf-8");
      this.importSnapshot(parseSnapshotFromDisk(JSON.parse(raw)));
    } catch (error) {
      if (!isFileMissing(error)) {
        throw error;
      }
    }

    this.initialized = true;
  }

  async upsertTable(input: UpsertTableInput): Promise<IndexedTableRecord> {
    await this.initialize();
    return this.mutateAndPersist(() => super.upsertTable(input));
  }

  async listTables(): Promise<IndexedTableRecord[]> {
    await this.initialize();
    return super.listTables();
  }

  async search(input: SearchInput): Promise<SearchResult[]> {
    await this.initialize();
    return super.search(input);
  }

  async clear(): Promise<ClearResult> {
    await this.initialize();
    return this.mutateAndPersist(() => super.clear());
  }

  async close(): Promise<void> {
    await this.initialize();
    await this.enqueueWrite(() => this.persistNow());
  }

  private async mutateAndPersist<T>(mutate: () => Promise<T>): Promise<T> {
    const previous = this.exportSnapshot();
    const result = await mutate();
    try {
      await this.enqueueWrite(() => this.persistNow());
    } catch (error) {
      this.importSnapshot(previous);
      throw error;
    }
    return result;
  }

  private enqueueWrite(task: () => Promise<void>): Promise<void> {
    this.writeChain = this.writeChain.then(task, task);
    return this.writeChain;
  }

  private async persistNow(): Promise<void> {
    const payload: PersistedIndex = {
      format_version: CURRENT_FORMAT_VERSION,
      saved_at: new Date().toISOString(),
      snapshot: this.exportSnapshot(),
    };

    const serialized = JSON.stringify(payload);
    const bytes = Buffer.byteLength(serialized, "utf-8");
    if (bytes > this.options.maxBytes) {
      throw new Error(
        `Schema index snapshot exceeds size limit (${bytes} > ${this.options.maxBytes} bytes).`,
      );
    }

    await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });
    const tempPath = `${this.absolutePath}.tmp`;
    await fs.writeFile(tempPath, serialized, "utf-8");
    await replaceFileSafely(tempPath, this.absolutePath, serialized);
  }
}

function parseSnapshotFromDisk(raw: unknown): InMemoryKnowledgeBaseSnapshot {
  const parsed = persistedIndexSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error("Invalid schema index snapshot format.");
  }
  if (parsed.data.format_version !== CURRENT_FORMAT_VERSION) {
    throw new Error(
      `Unsupported schema index format version: ${parsed.data.format_version}. Expected ${CURRENT_FORMAT_VERSION}.`,
    );
  }
  return parsed.data.snapshot;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function isFileMissing(error: unknown): boolean {
  return errorCode(error) === "ENOENT";
}

function isReplaceableRenameError(error: unknown): boolean {
  const code = errorCode(error);
  return code === "EPERM" || code === "EEXIST" || code === "EBUSY";
}

async function replaceFileSafely(
  tempPath: string,
  targetPath: string,
  content: string,
): Promise<void> {
  try {
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  try {
    await fs.rm(targetPath, { force: true });
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  // Last fallback for Windows file-lock edge cases.
  await fs.writeFile(targetPath, content, "utf-8");
  await fs.rm(tempPath, { force: true });
}
