import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { existsSync, mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import type { StoreConfig } from "../../src/config.js";
import { printListing, runListing } from "../../src/list.js";
import { MemoryUrlStore } from "../../src/storage_memory.js";
import { SqliteUrlStore } from "../../src/storage_sqlite.js";

function fixedCodes(...codes: string[]) {
  let i = 0;
  return { generate: () => codes[i++], maxAttempts: 1 };
}

describe("printListing", () => {
  it("prints a count header and one line per mapping", async () => {
    const store = new MemoryUrlStore(fixedCodes("abc1234", "xyz9876"));
    await store.create("https://example.com/one");
    await store.create("https://example.com/two");

    const lines: string[] = [];
    const n = await printListing(store, "links.db", (l) => lines.push(l));

    expect(n).toBe(2);
    expect(lines).toEqual([
      "2 mappings found in links.db:",
      "  abc1234 -> https://example.com/one",
      "  xyz9876 -> https://example.com/two"
    ]);
  });

  it("uses the singular for one mapping", async () => {
    const store = new MemoryUrlStore(fixedCodes("only001"));
    await store.create("https://example.com/only");

    const lines: string[] = [];
    await printListing(store, "links.db", (l) => lines.push(l));
    expect(lines[0]).toBe("1 mapping found in links.db:");
  });

  it("reports an empty store", async () => {
    const lines: string[] = [];
    await printListing(new MemoryUrlStore(), "links.db", (l) => lines.push(l));
    expect(lines).toEqual(["0 mappings found in links.db:"]);
  });
});

describe("runListing", () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "link-service-ls-"));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const sqlite = (dbPath: string): StoreConfig => ({
    storageMode: "sqlite",
    dbPath,
    codeLength: 7,
    maxAttempts: 8
  });

  function capture() {
    const out: string[] = [];
    const err: string[] = [];
    return { out, err, io: { out: (l: string) => out.push(l), err: (l: string) => err.push(l) } };
  }

  it("exits 1 without creating the file when the database is missing", async () => {
    const path = join(dir, "nested", "missing.db");
    const { out, err, io } = capture();

    expect(await runListing(sqlite(path), io)).toBe(1);
    expect(err).toEqual([`database file does not exist or is not a file: ${path}`]);
    expect(out).toEqual([]);
    expect(existsSync(path)).toBe(false);
    expect(existsSync(join(dir, "nested"))).toBe(false);
  });

  it("exits 1 when the path is a directory", async () => {
    const { err, io } = capture();

    expect(await runListing(sqlite(dir), io)).toBe(1);
    expect(err).toEqual([`database file does not exist or is not a file: ${dir}`]);
  });

  it("prints the mappings of an existing database", async () => {
    const path = join(dir, "links.db");
    const store = new SqliteUrlStore(path, { generate: () => "lst0001", maxAttempts: 1 });
    await store.init();
    await store.create("https://example.com/listed");
    await store.close();

    const { out, err, io } = capture();

    expect(await runListing(sqlite(path), io)).toBe(0);
    expect(out).toEqual([`1 mapping found in ${path}:`, "  lst0001 -> https://example.com/listed"]);
    expect(err).toEqual([]);
  });
});
