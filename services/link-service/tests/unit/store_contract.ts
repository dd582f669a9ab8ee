import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { UrlStore } from "../../src/storage.js";
import type { CodeOptions } from "../../src/short_code.js";
import { ExhaustedError, ValidationError } from "../../src/errors.js";

/** Behaviour every UrlStore must share, run once per implementation. */
export function describeUrlStoreContract(name: string, make: (codes?: CodeOptions) => UrlStore): void {
  describe(`${name} contract`, () => {
    let store: UrlStore;

    beforeEach(async () => {
      store = make();
      await store.init();
    });

    afterEach(async () => {
      await store.close();
    });

    it("round-trips a url through create and get", async () => {
      const rec = await store.create("https://example.com/long/path");
      expect(rec.code).toMatch(/^[0-9a-zA-Z]{7}$/);
      expect(rec.longUrl).toBe("https://example.com/long/path");

      const found = await store.get(rec.code);
      expect(found).toEqual(rec);
    });

    it("returns null for a code it never issued", async () => {
      await store.create("https://example.com/a");
      expect(await store.get("doesnotexist")).toBeNull();
    });

    it("assigns a new code every time, even for the same url", async () => {
      const a = await store.create("https://example.com/same");
      const b = await store.create("https://example.com/same");
      expect(a.code).not.toBe(b.code);
    });

    it("rejects an empty url", async () => {
      await expect(store.create("")).rejects.toBeInstanceOf(ValidationError);
      expect(await store.list()).toEqual([]);
    });

    it("hands out distinct codes to concurrent creates", async () => {
      const urls = Array.from({ length: 50 }, (_, i) => `https://example.com/item/${i}`);
      const recs = await Promise.all(urls.map((u) => store.create(u)));

      expect(new Set(recs.map((r) => r.code)).size).toBe(urls.length);
      for (const rec of recs) {
        expect((await store.get(rec.code))?.longUrl).toBe(rec.longUrl);
      }

      const listed = await store.list();
      expect(listed).toHaveLength(urls.length);
      expect(new Set(listed.map((r) => r.code)).size).toBe(urls.length);
    });

    it("lists mappings in insertion order", async () => {
      const first = await store.create("https://example.com/1");
      const second = await store.create("https://example.com/2");
      expect((await store.list()).map((r) => r.code)).toEqual([first.code, second.code]);
    });

    it("retries past a collision instead of overwriting", async () => {
      const codes = ["AAAAAAA", "AAAAAAA", "BBBBBBB"];
      let i = 0;
      const colliding = make({ generate: () => codes[i++], maxAttempts: 3 });
      await colliding.init();
      try {
        const a = await colliding.create("https://example.com/first");
        const b = await colliding.create("https://example.com/second");

        expect(a.code).toBe("AAAAAAA");
        expect(b.code).toBe("BBBBBBB");
        expect((await colliding.get("AAAAAAA"))?.longUrl).toBe("https://example.com/first");
      } finally {
        await colliding.close();
      }
    });

    it("gives up with ExhaustedError when every candidate is taken", async () => {
      const full = make({ generate: () => "ZZZZZZZ", maxAttempts: 2 });
      await full.init();
      try {
        await full.create("https://example.com/first");
        await expect(full.create("https://example.com/second")).rejects.toBeInstanceOf(ExhaustedError);
        expect(await full.list()).toHaveLength(1);
      } finally {
        await full.close();
      }
    });
  });
}
