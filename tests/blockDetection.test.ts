import { describe, expect, it } from "vitest";
import { classifyBlock, detectBlocks } from "../src/pipelines/blockDetection.js";
import { CUSTOMERS_INFO } from "./fakes/fixtures.js";

describe("block detection", () => {
  it("isolates comment blocks and unwraps their delimiters", () => {
    const blocks = detectBlocks(
      "CREATE TABLE customers (customer_id TEXT)\n\n/*\n3 rows from customers table:\n...*/",
    );

    expect(blocks).toEqual([
      { text: "CREATE TABLE customers (customer_id TEXT)", type: "schema" },
      { text: "3 rows from customers table:\n...", type: "samples" },
    ]);
  });

  it("keeps source order for ddl, column comments and sample rows", () => {
    const blocks = detectBlocks(CUSTOMERS_INFO);

    expect(blocks.map((block) => block.type)).toEqual(["schema", "columns", "samples"]);
    expect(blocks[1].text).toBe(
      "Column Comments: {'customer_id': 'key to the orders table'}",
    );
    expect(blocks[2].text.startsWith("2 rows from customers table:\n")).toBe(true);
  });

  it("classifies case-insensitively", () => {
    expect(classifyBlock("CREATE TABLE foo (id INT)")).toBe("schema");
    expect(classifyBlock("create table foo (id int)")).toBe("schema");
    expect(classifyBlock("COLUMN COMMENTS: {}")).toBe("columns");
    expect(classifyBlock("3 ROWS FROM foo table:")).toBe("samples");
  });

  it("applies keyword priority", () => {
    expect(classifyBlock("Column Comments: {'note': '3 rows from the feed'}")).toBe("columns");
    expect(classifyBlock("create table t (x int) -- rows from somewhere")).toBe("schema");
  });

  it("returns a single general block when there are no comments", () => {
    expect(detectBlocks("  Tracks warehouse stock levels.\n")).toEqual([
      { text: "Tracks warehouse stock levels.", type: "general" },
    ]);
  });

  it("drops whitespace-only segments and empty comments", () => {
    expect(detectBlocks("  \n /* note */  \n/**/\n")).toEqual([
      { text: "note", type: "general" },
    ]);
    expect(detectBlocks("   ")).toEqual([]);
  });

  it("treats an unterminated comment as plain text", () => {
    expect(detectBlocks("CREATE TABLE t (a INT)\n/* dangling")).toEqual([
      { text: "CREATE TABLE t (a INT)\n/* dangling", type: "schema" },
    ]);
  });
});
