/**
 * Tests for pagination utilities — encodeCursor, decodeCursor, paginate.
 */

import { describe, it, expect } from "vitest";
import { decodeCursor, encodeCursor, paginate } from "../src/types/pagination.js";

// =============================================================================
// decodeCursor
// =============================================================================

describe("decodeCursor", () => {
  it("reads back an encoded cursor", () => {
    expect(decodeCursor(encodeCursor("sequence", 42))).toEqual({
      field: "sequence",
      position: 42,
    });
  });

  it("returns undefined for valid base64 but invalid JSON", () => {
    const notJson = Buffer.from("not json at all").toString("base64url");
    expect(decodeCursor(notJson)).toBeUndefined();
  });

  it("returns undefined when a field is missing or mistyped", () => {
    const encode = (value: unknown): string =>
      Buffer.from(JSON.stringify(value)).toString("base64url");

    expect(decodeCursor(encode({ f: "sequence" }))).toBeUndefined();
    expect(decodeCursor(encode({ v: 3 }))).toBeUndefined();
    expect(decodeCursor(encode({ f: "sequence", v: "3" }))).toBeUndefined();
    expect(decodeCursor(encode({ f: "sequence", v: 1.5 }))).toBeUndefined();
    expect(decodeCursor(encode({ f: "sequence", v: -1 }))).toBeUndefined();
  });

  it("returns undefined for non-object JSON", () => {
    expect(decodeCursor(Buffer.from("42").toString("base64url"))).toBeUndefined();
    expect(decodeCursor(Buffer.from("null").toString("base64url"))).toBeUndefined();
  });
});

// =============================================================================
// paginate
// =============================================================================

describe("paginate", () => {
  const items = [1, 2, 3, 4, 5];
  const position = (n: number): number => n;

  it("returns the first page with a cursor when more remain", () => {
    const page = paginate(items, { limit: 2 }, position, "n");

    expect(page.data).toEqual([1, 2]);
    expect(page.pagination).toEqual({ cursor: encodeCursor("n", 2), hasMore: true });
  });

  it("continues after the cursor position", () => {
    const page = paginate(items, { limit: 2, cursor: encodeCursor("n", 4) }, position, "n");

    expect(page.data).toEqual([5]);
    expect(page.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("returns no cursor when the page is exactly full", () => {
    const page = paginate(items, { limit: 5 }, position, "n");

    expect(page.data).toEqual(items);
    expect(page.pagination.hasMore).toBe(false);
  });

  it("ignores a cursor for another field or a malformed one", () => {
    expect(paginate(items, { limit: 2, cursor: encodeCursor("other", 4) }, position, "n").data).toEqual([1, 2]);
    expect(paginate(items, { limit: 2, cursor: "garbage" }, position, "n").data).toEqual([1, 2]);
  });

  it("handles an empty list", () => {
    expect(paginate<number>([], { limit: 10 }, position, "n")).toEqual({
      data: [],
      pagination: { cursor: null, hasMore: false },
    });
  });
});
