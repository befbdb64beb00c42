/**
 * Tests for JsonlEventStore when a write fails part way.
 *
 * `appendFileSync` is wrapped so a test can make one call write a
 * fragment of its data and then throw, as a full disk would.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { appendFileSync, mkdtempSync, readFileSync, rmSync, writeSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { JsonlEventStore } from "../src/jsonl-store.js";
import { makeEvents } from "./fixtures.js";

vi.mock("node:fs", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs")>();
  return { ...actual, appendFileSync: vi.fn(actual.appendFileSync) };
});

let testDir: string;
let testFile: string;

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), "tollgate-jsonl-fail-"));
  testFile = join(testDir, "events.jsonl");
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
  vi.mocked(appendFileSync).mockClear();
});

function tearNextWrite(): void {
  vi.mocked(appendFileSync).mockImplementationOnce((file, data) => {
    if (typeof file !== "number" || typeof data !== "string") {
      throw new Error("expected a descriptor and string data");
    }
    writeSync(file, data.slice(0, 20));
    throw new Error("No space left on device");
  });
}

describe("torn write", () => {
  it("rethrows and indexes nothing", () => {
    const store = new JsonlEventStore({ filePath: testFile });
    store.append("s", makeEvents(1));

    tearNextWrite();
    expect(() => store.append("s", makeEvents(1))).toThrow("No space left on device");

    expect(store.readAll()).toHaveLength(1);
    expect(store.streamVersion("s")).toBe(1);
  });

  it("starts the next append on a fresh line", () => {
    const store = new JsonlEventStore({ filePath: testFile });
    store.append("s", makeEvents(1));

    tearNextWrite();
    expect(() => store.append("s", makeEvents(1))).toThrow("No space left on device");
    store.append("s", makeEvents(1));

    const lines = readFileSync(testFile, "utf-8").split("\n");
    expect(lines).toHaveLength(4);
    expect(lines[1]).toHaveLength(20);
    expect(lines[3]).toBe("");

    const reopened = new JsonlEventStore({ filePath: testFile });
    expect(reopened.readAll()).toHaveLength(2);
    expect(reopened.skippedLines).toBe(1);
    expect(reopened.streamVersion("s")).toBe(2);
    expect(reopened.verifyIntegrity().valid).toBe(true);
  });
});
