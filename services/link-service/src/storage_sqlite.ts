import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import type { UrlRecord, UrlStore } from "./storage.js";
import { StorageError, ValidationError } from "./errors.js";
import { allocateCode, resolveCodeOptions, type CodeOptions } from "./short_code.js";

interface UrlRow {
  code: string;
  long_url: string;
  created_at: string;
}

export interface SqliteStoreOptions extends CodeOptions {
  /** Only open a file that already holds the table; used by `ls`. */
  mustExist?: boolean;
}

interface Opened {
  db: Database.Database;
  insert: Database.Statement<[string, string, string]>;
  findByCode: Database.Statement<[string], UrlRow>;
  listAll: Database.Statement<[], UrlRow>;
}

/**
 * Durable store in a single SQLite file. better-sqlite3 runs each statement
 * synchronously, and the PRIMARY KEY makes the insert conditional, so a code
 * is claimed by at most one writer even when several processes share the file.
 */
export class SqliteUrlStore implements UrlStore {
  private opened: Opened | null = null;
  private readonly codes: Required<CodeOptions>;

  constructor(
    readonly path: string,
    private readonly options: SqliteStoreOptions = {}
  ) {
    this.codes = resolveCodeOptions(options);
  }

  async init(): Promise<void> {
    if (this.opened) return;

    this.opened = this.guard("open", () => {
      const mustExist = this.options.mustExist ?? false;
      if (!mustExist) mkdirSync(dirname(this.path), { recursive: true });

      const db = new Database(this.path, { fileMustExist: mustExist });
      try {
        // mustExist is the listing mode: no journal change, no schema
        if (!mustExist) {
          db.pragma("journal_mode = WAL");
          db.exec(`
            CREATE TABLE IF NOT EXISTS urls (
              code       TEXT PRIMARY KEY,
              long_url   TEXT NOT NULL,
              created_at TEXT NOT NULL
            )
          `);
        }

        return {
          db,
          insert: db.prepare<[string, string, string]>(
            "INSERT INTO urls (code, long_url, created_at) VALUES (?, ?, ?) ON CONFLICT(code) DO NOTHING"
          ),
          findByCode: db.prepare<[string], UrlRow>(
            "SELECT code, long_url, created_at FROM urls WHERE code = ?"
          ),
          listAll: db.prepare<[], UrlRow>("SELECT code, long_url, created_at FROM urls ORDER BY rowid")
        };
      } catch (err) {
        db.close();
        throw err;
      }
    });
  }

  async create(longUrl: string): Promise<UrlRecord> {
    if (longUrl.length === 0) throw new ValidationError("url is required");
    const { insert } = this.handle();

    return allocateCode(async (code) => {
      const createdAt = new Date().toISOString();
      const res = this.guard("insert", () => insert.run(code, longUrl, createdAt));
      return res.changes === 1 ? { code, longUrl, createdAt } : null;
    }, this.codes);
  }

  async get(code: string): Promise<UrlRecord | null> {
    const { findByCode } = this.handle();
    const row = this.guard("lookup", () => findByCode.get(code));
    return row ? toRecord(row) : null;
  }

  async list(): Promise<UrlRecord[]> {
    const { listAll } = this.handle();
    return this.guard("list", () => listAll.all()).map(toRecord);
  }

  async close(): Promise<void> {
    this.opened?.db.close();
    this.opened = null;
  }

  private handle(): Opened {
    if (!this.opened) throw new StorageError(`sqlite store at ${this.path} is not open`);
    return this.opened;
  }

  private guard<T>(what: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new StorageError(`sqlite ${what} failed for ${this.path}`, { cause: err });
    }
  }
}

function toRecord(row: UrlRow): UrlRecord {
  return { code: row.code, longUrl: row.long_url, createdAt: row.created_at };
}
