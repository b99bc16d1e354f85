import { describe, expect, it } from "vitest";
import { IndexedDocumentInput } from "../src/domain/knowledgeBase.js";
import { InMemoryKnowledgeBase } from "../src/infra/store/inMemoryKnowledgeBase.js";

function doc(
  tableName: string,
  index: number,
  text: string,
  embedding: number[] | null = null,
): IndexedDocumentInput {
  return {
    index,
    text,
    metadata: {
      table_name: tableName,
      columns: [],
      source: "database_schema",
      chunk_type: "schema",
      chunk_order: index + 1,
    },
    embedding,
  };
}

describe("InMemoryKnowledgeBase", () => {
  it("keeps lexical bm25 evidence when semantic search finds nothing", async () => {
    const kb = new InMemoryKnowledgeBase();
    await kb.upsertTable({
      tableName: "orders",
      documents: [doc("orders", 0, "TABLE: orders\n\nSCHEMA:\norder_status TEXT", [0, 1])],
    });
    await kb.upsertTable({
      tableName: "customers",
      documents: [doc("customers", 0, "TABLE: customers\n\nSCHEMA:\ncustomer_city TEXT")],
    });

    const hits = await kb.search({
      query: "customer city",
      queryEmbedding: [1, 0],
      topK: 2,
    });

    expect(hits.length).toBeGreaterThan(0);
    expect(hits[0].table.tableName).toBe("customers");
  });

  it("fuses semantic and bm25 rankings", async () => {
    const kb = new InMemoryKnowledgeBase();
    await kb.upsertTable({
      tableName: "payments",
      documents: [
        doc("payments", 0, "payment_value NUMERIC", [1, 0]),
        doc("payments", 1, "payment_type TEXT", [0, 1]),
      ],
    });

    const hits = await kb.search({ query: "payment type", queryEmbedding: [0, 1], topK: 2 });

    expect(hits.map((hit) => hit.chunk.index)).toEqual([1, 0]);
  });

  it("restricts search to the given tables", async () => {
    const kb = new InMemoryKnowledgeBase();
    await kb.upsertTable({ tableName: "orders", documents: [doc("orders", 0, "order_id TEXT")] });
    await kb.upsertTable({
      tableName: "customers",
      documents: [doc("customers", 0, "customer_id TEXT")],
    });

    const hits = await kb.search({
      query: "id",
      queryEmbedding: null,
      topK: 5,
      tableNames: ["customers"],
    });
    expect(hits.map((hit) => hit.table.tableName)).toEqual(["customers"]);

    const none = await kb.search({
      query: "id",
      queryEmbedding: null,
      topK: 5,
      tableNames: ["missing"],
    });
    expect(none).toEqual([]);
  });

  it("falls back to the first chunk of each table for broad queries", async () => {
    const kb = new InMemoryKnowledgeBase();
    await kb.upsertTable({
      tableName: "zeta",
      documents: [doc("zeta", 1, "xxx kkk second"), doc("zeta", 0, "xxx kkk")],
    });
    await kb.upsertTable({ tableName: "alpha", documents: [doc("alpha", 0, "zzz qqq")] });

    const hits = await kb.search({ query: "overview", queryEmbedding: null, topK: 5 });

    expect(hits.map((hit) => [hit.table.tableName, hit.chunk.text, hit.score])).toEqual([
      ["alpha", "zzz qqq", 0.0001],
      ["zeta", "xxx kkk", 0.0001],
    ]);
  });

  it("returns nothing for an unrelated narrow query", async () => {
    const kb = new InMemoryKnowledgeBase();
    await kb.upsertTable({ tableName: "alpha", documents: [doc("alpha", 0, "zzz qqq")] });
    expect(await kb.search({ query: "mmm", queryEmbedding: null, topK: 5 })).toEqual([]);
  });

  it("replaces a table's chunks on re-index", async () => {
    const kb = new InMemoryKnowledgeBase();
    await kb.upsertTable({
      tableName: "orders",
      documents: [doc("orders", 0, "old text"), doc("orders", 1, "older text")],
    });
    const table = await kb.upsertTable({
      tableName: "orders",
      documents: [doc("orders", 0, "new text")],
    });

    expect(table.chunkCount).toBe(1);
    const hits = await kb.search({ query: "text", queryEmbedding: null, topK: 5 });
    expect(hits.map((hit) => [hit.chunk.id, hit.chunk.text])).toEqual([
      [`${table.id}:0`, "new text"],
    ]);
  });

  it("lists tables by name and falls back to their lowest-index chunks", async () => {
    const kb = new InMemoryKnowledgeBase();
    await kb.upsertTable({
      tableName: "orders",
      documents: [doc("orders", 1, "o1"), doc("orders", 0, "o0")],
    });
    await kb.upsertTable({ tableName: "customers", documents: [doc("customers", 0, "c0")] });

    expect((await kb.listTables()).map((table) => table.tableName)).toEqual([
      "customers",
      "orders",
    ]);

    const overview = await kb.search({ query: "overview", queryEmbedding: null, topK: 5 });
    expect(overview.map((hit) => hit.chunk.text)).toEqual(["c0", "o0"]);

    const limited = await kb.search({ query: "overview", queryEmbedding: null, topK: 1 });
    expect(limited.map((hit) => hit.chunk.text)).toEqual(["c0"]);
  });

  it("clears everything and reports counts", async () => {
    const kb = new InMemoryKnowledgeBase();
    await kb.upsertTable({
      tableName: "orders",
      documents: [doc("orders", 0, "a"), doc("orders", 1, "b")],
    });
    await kb.upsertTable({ tableName: "customers", documents: [doc("customers", 0, "c")] });

    expect(await kb.clear()).toEqual({ cleared_tables: 2, cleared_chunks: 3 });
    expect(await kb.listTables()).toEqual([]);
    expect(await kb.search({ query: "list tables", queryEmbedding: null, topK: 5 })).toEqual([]);
  });
});
