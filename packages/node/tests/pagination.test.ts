/**
 * Tests for cursor-based pagination utilities.
 */

import { describe, it, expect } from "vitest";
import { decodeCursor, encodeCursor, paginate } from "../src/types/pagination.js";

const items = [1, 2, 3, 10, 11].map((position) => ({ position }));
const byPosition = (item: { position: number }) => item.position;

describe("encodeCursor / decodeCursor", () => {
  it("round-trips field and position", () => {
    expect(decodeCursor(encodeCursor("globalPosition", 42))).toEqual({
      field: "globalPosition",
      position: 42,
    });
  });

  it("returns undefined for garbage", () => {
    expect(decodeCursor("%%%")).toBeUndefined();
  });

  it("returns undefined for a well-formed cursor with a bad position", () => {
    const cursor = Buffer.from(JSON.stringify({ f: "globalPosition", p: "9" })).toString("base64url");
    expect(decodeCursor(cursor)).toBeUndefined();
  });
});

describe("paginate", () => {
  it("returns the first page and a cursor when more remain", () => {
    const page = paginate(items, { limit: 2 }, byPosition, "position");
    expect(page.data.map(byPosition)).toEqual([1, 2]);
    expect(page.pagination).toEqual({ cursor: encodeCursor("position", 2), hasMore: true });
  });

  it("compares positions numerically", () => {
    const page = paginate(items, { cursor: encodeCursor("position", 3), limit: 2 }, byPosition, "position");
    expect(page.data.map(byPosition)).toEqual([10, 11]);
    expect(page.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("ignores a cursor issued for another field", () => {
    const page = paginate(items, { cursor: encodeCursor("other", 3), limit: 10 }, byPosition, "position");
    expect(page.data).toHaveLength(5);
  });
});
