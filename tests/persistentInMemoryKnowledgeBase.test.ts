import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { PersistentInMemoryKnowledgeBase } from "../src/infra/store/persistentInMemoryKnowledgeBase.js";

const TEMP_DIR = path.resolve(".tmp-tests-persistent");
const TEMP_FILE = path.join(TEMP_DIR, "persistent-kb-test.json");

describe("PersistentInMemoryKnowledgeBase", () => {
  afterEach(async () => {
    await fs.rm(TEMP_DIR, { recursive: true, force: true });
  });

  it("restores indexed tables after restart", async () => {
    const kb1 = new PersistentInMemoryKnowledgeBase(TEMP_FILE, { maxBytes: 1_000_000 });
    await kb1.initialize();
    await kb1.upsertTable({
      tableName: "weekly_reports",
      documents: [
        {
          index: 0,
          text: "TABLE: weekly_reports\n\nSCHEMA:\nCREATE TABLE weekly_reports (report_id INT)",
          metadata: {
            table_name: "weekly_reports",
            columns: ["report_id"],
            source: "database_schema",
            chunk_type: "schema",
            chunk_order: 1,
          },
          embedding: [0.1, 0.2, 0.3],
        },
      ],
    });
    await kb1.close();

    const kb2 = new PersistentInMemoryKnowledgeBase(TEMP_FILE, { maxBytes: 1_000_000 });
    await kb2.initialize();

    const tables = await kb2.listTables();
    expect(tables.map((table) => [table.tableName, table.chunkCount])).toEqual([
      ["weekly_reports", 1],
    ]);

    const [hit] = await kb2.search({ query: "report", queryEmbedding: null, topK: 1 });
    expect(hit.chunk.metadata).toEqual({
      table_name: "weekly_reports",
      columns: ["report_id"],
      source: "database_schema",
      chunk_type: "schema",
      chunk_order: 1,
    });

    const semanticHits = await kb2.search({
      query: "weekly report",
      queryEmbedding: [0.1, 0.2, 0.3],
      topK: 3,
    });
    expect(semanticHits[0].table.tableName).toBe("weekly_reports");
  });

  it("persists a cleared index", async () => {
    const kb1 = new PersistentInMemoryKnowledgeBase(TEMP_FILE, { maxBytes: 1_000_000 });
    await kb1.upsertTable({
      tableName: "orders",
      documents: [
        {
          index: 0,
          text: "order_id TEXT",
          metadata: { table_name: "orders", columns: [], source: "database_schema" },
          embedding: null,
        },
      ],
    });
    expect(await kb1.clear()).toEqual({ cleared_tables: 1, cleared_chunks: 1 });

    const kb2 = new PersistentInMemoryKnowledgeBase(TEMP_FILE, { maxBytes: 1_000_000 });
    expect(await kb2.listTables()).toEqual([]);
  });

  it("rejects a snapshot with an unknown format", async () => {
    await fs.mkdir(TEMP_DIR, { recursive: true });
    await fs.writeFile(TEMP_FILE, JSON.stringify({ tables: [] }), "utf-8");

    const kb = new PersistentInMemoryKnowledgeBase(TEMP_FILE, { maxBytes: 1_000_000 });
    await expect(kb.initialize()).rejects.toThrow("Invalid schema index snapshot format.");
  });

  it("enforces max index file size", async () => {
    const kb = new PersistentInMemoryKnowledgeBase(TEMP_FILE, { maxBytes: 120 });
    await kb.initialize();

    await expect(kb.upsertTable(oversizeTable())).rejects.toThrow("exceeds size limit");
    expect(await kb.listTables()).toEqual([]);
    expect(await kb.search({ query: "overview", queryEmbedding: null, topK: 5 })).toEqual([]);
    await expect(kb.close()).resolves.toBeUndefined();
  });

  it("keeps earlier tables when a later write is rejected", async () => {
    const kb1 = new PersistentInMemoryKnowledgeBase(TEMP_FILE, { maxBytes: 1_000 });
    await kb1.upsertTable({
      tableName: "orders",
      documents: [
        {
          index: 0,
          text: "order_id TEXT",
          metadata: { table_name: "orders", columns: [], source: "database_schema" },
          embedding: null,
        },
      ],
    });

    await expect(kb1.upsertTable(oversizeTable(2_000))).rejects.toThrow("exceeds size limit");
    expect((await kb1.listTables()).map((table) => table.tableName)).toEqual(["orders"]);
    await kb1.close();

    const kb2 = new PersistentInMemoryKnowledgeBase(TEMP_FILE, { maxBytes: 1_000 });
    expect((await kb2.listTables()).map((table) => table.tableName)).toEqual(["orders"]);
  });
});

function oversizeTable(length = 200) {
  return {
    tableName: "oversize",
    documents: [
      {
        index: 0,
        text: "A".repeat(length),
        metadata: {
          table_name: "oversize",
          columns: [],
          source: "database_schema" as const,
        },
        embedding: null,
      },
    ],
  };
}
