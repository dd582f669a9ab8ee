import type { UrlRecord, UrlStore } from "./storage.js";
import { ValidationError } from "./errors.js";
import { allocateCode, resolveCodeOptions, type CodeOptions } from "./short_code.js";

/** Not durable; for local runs and tests. */
export class MemoryUrlStore implements UrlStore {
  private readonly map = new Map<string, UrlRecord>();
  private readonly codes: Required<CodeOptions>;

  constructor(options: CodeOptions = {}) {
    this.codes = resolveCodeOptions(options);
  }

  async init(): Promise<void> {
    // nothing
  }

  async create(longUrl: string): Promise<UrlRecord> {
    if (longUrl.length === 0) throw new ValidationError("url is required");

    return allocateCode(async (code) => {
      // has + set run in one tick, so no other create can interleave
      if (this.map.has(code)) return null;
      const rec: UrlRecord = { code, longUrl, createdAt: new Date().toISOString() };
      this.map.set(code, rec);
      return rec;
    }, this.codes);
  }

  async get(code: string): Promise<UrlRecord | null> {
    return this.map.get(code) ?? null;
  }

  async list(): Promise<UrlRecord[]> {
    return [...this.map.values()];
  }

  async close(): Promise<void> {
    // nothing
  }
}
