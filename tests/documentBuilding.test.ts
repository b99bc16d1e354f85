import { describe, expect, it } from "vitest";
import { MalformedRecordError } from "../src/domain/errors.js";
import { buildSchemaDocuments } from "../src/pipelines/documentBuilding.js";

describe("schema document building", () => {
  it("maps chunk records to documents with chunk metadata", () => {
    const documents = buildSchemaDocuments([
      {
        table_name: "orders",
        columns_names: ["order_id"],
        content: "TABLE: orders\n\nSCHEMA:\nCREATE TABLE orders (order_id TEXT)",
        chunk_type: "schema",
        chunk_order: 1,
      },
    ]);

    expect(documents).toEqual([
      {
        pageContent: "TABLE: orders\n\nSCHEMA:\nCREATE TABLE orders (order_id TEXT)",
        metadata: {
          table_name: "orders",
          columns: ["order_id"],
          source: "database_schema",
          chunk_type: "schema",
          chunk_order: 1,
        },
      },
    ]);
  });

  it("trims whole-schema records and leaves chunk fields out", () => {
    const [document] = buildSchemaDocuments([
      {
        table_name: "orders",
        columns_names: ["order_id", "order_status"],
        table_schema: "\nTABLE: orders\n\nDESCRIPTION: No description\n\nCREATE TABLE orders ()\n\n",
      },
    ]);

    expect(document.pageContent).toBe(
      "TABLE: orders\n\nDESCRIPTION: No description\n\nCREATE TABLE orders ()",
    );
    expect(document.metadata).toEqual({
      table_name: "orders",
      columns: ["order_id", "order_status"],
      source: "database_schema",
    });
    expect("chunk_type" in document.metadata).toBe(false);
  });

  it("copies the column list", () => {
    const columns = ["a", "b"];
    const [document] = buildSchemaDocuments([
      { table_name: "t", columns_names: columns, content: "x" },
    ]);
    columns.push("c");
    expect(document.metadata.columns).toEqual(["a", "b"]);
  });

  it("keeps input order", () => {
    const documents = buildSchemaDocuments([
      { table_name: "b", columns_names: [], content: "second table" },
      { table_name: "a", columns_names: [], content: "first table" },
    ]);
    expect(documents.map((document) => document.metadata.table_name)).toEqual(["b", "a"]);
  });

  it("rejects a record without content", () => {
    const build = () =>
      buildSchemaDocuments([
        { table_name: "ok", columns_names: [], content: "fine" },
        { table_name: "orders", columns_names: [] },
      ]);

    expect(build).toThrow(MalformedRecordError);
    expect(build).toThrow('Malformed schema record at index 1: missing or invalid field "content"');
  });

  it("names the offending field", () => {
    const catchError = (record: Record<string, unknown>): MalformedRecordError => {
      try {
        buildSchemaDocuments([record]);
      } catch (error) {
        if (error instanceof MalformedRecordError) {
          return error;
        }
        throw error;
      }
      throw new Error("expected MalformedRecordError");
    };

    expect(catchError({ columns_names: [], content: "x" })).toMatchObject({
      field: "table_name",
      recordIndex: 0,
    });
    expect(catchError({ table_name: "", columns_names: [], content: "x" }).field).toBe(
      "table_name",
    );
    expect(catchError({ table_name: "t", columns_names: "a,b", content: "x" }).field).toBe(
      "columns_names",
    );
    expect(
      catchError({ table_name: "t", columns_names: [], content: "x", chunk_type: "other" }).field,
    ).toBe("chunk_type");
  });

  it("returns nothing for no records", () => {
    expect(buildSchemaDocuments([])).toEqual([]);
  });
});
