import { describe, expect, it } from "vitest";
import {
  isBroadQueryIntent,
  normalizeText,
  scoreByTokenOverlap,
  tokenize,
  tokenizeForBm25,
} from "../src/utils/text.js";

describe("text utils", () => {
  it("splits identifiers on underscores and lowercases", () => {
    expect(tokenizeForBm25("Customer_City TEXT")).toEqual(["customer", "city", "text"]);
  });

  it("splits camelCase identifiers", () => {
    expect(tokenizeForBm25("orderStatus customerCityId")).toEqual([
      "order",
      "status",
      "statu",
      "customer",
      "city",
      "id",
    ]);
    expect(scoreByTokenOverlap("customer city", "customerCity TEXT")).toBeGreaterThan(0.8);
  });

  it("adds singular variants of plural words", () => {
    expect(tokenize("categories orders class")).toEqual([
      "categories",
      "category",
      "orders",
      "order",
      "class",
    ]);
  });

  it("drops single-character tokens", () => {
    expect(tokenize("a b id")).toEqual(["id"]);
  });

  it("normalizes line endings and tabs", () => {
    expect(normalizeText("  a\tb\r\nc  ")).toBe("a b\nc");
  });

  it("scores overlapping tokens", () => {
    // query {order, status, statu} against {order, status, statu, text}
    expect(scoreByTokenOverlap("order status", "order_status TEXT")).toBeCloseTo(
      3 / Math.sqrt(3 * 4),
    );
    expect(scoreByTokenOverlap("", "order_status")).toBe(0);
  });

  it("matches plural queries to singular columns", () => {
    expect(scoreByTokenOverlap("customers", "customer_id")).toBeGreaterThan(0);
  });

  it("detects broad queries", () => {
    expect(isBroadQueryIntent("Give me an overview")).toBe(true);
    expect(isBroadQueryIntent("list all tables")).toBe(true);
    expect(isBroadQueryIntent("customer city")).toBe(false);
  });
});
