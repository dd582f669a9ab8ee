import pg from "pg";
import type { UrlRecord, UrlStore } from "./storage.js";
import { StorageError, ValidationError } from "./errors.js";
import { allocateCode, resolveCodeOptions, type CodeOptions } from "./short_code.js";

const { Pool } = pg;

// 23505 = unique_violation
const UNIQUE_VIOLATION = "23505";

/** The slice of pg.Pool this store uses; tests hand in a fake. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
  end(): Promise<void>;
}

export function createPgClient(databaseUrl: string): SqlClient {
  const pool = new Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000
  });
  return {
    async query(text, values) {
      const res = await pool.query(text, values);
      return { rows: res.rows, rowCount: res.rowCount };
    },
    end: () => pool.end()
  };
}

export class PostgresUrlStore implements UrlStore {
  private readonly codes: Required<CodeOptions>;
  private closed = false;

  constructor(
    private readonly client: SqlClient,
    options: CodeOptions = {}
  ) {
    this.codes = resolveCodeOptions(options);
  }

  // seq records insertion order; created_at can tie or step backwards with the clock
  async init(): Promise<void> {
    await this.run("init", `
      CREATE TABLE IF NOT EXISTS urls (
        seq BIGSERIAL,
        code TEXT PRIMARY KEY,
        long_url TEXT NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT now()
      );
      ALTER TABLE urls ADD COLUMN IF NOT EXISTS seq BIGSERIAL;
    `);
  }

  async create(longUrl: string): Promise<UrlRecord> {
    if (longUrl.length === 0) throw new ValidationError("url is required");

    return allocateCode(async (code) => {
      try {
        const res = await this.client.query(
          `INSERT INTO urls (code, long_url) VALUES ($1, $2)
           RETURNING code, long_url, created_at`,
          [code, longUrl]
        );
        return toRecord(res.rows[0]);
      } catch (e) {
        if (isUniqueViolation(e)) return null;
        throw wrap("insert", e);
      }
    }, this.codes);
  }

  async get(code: string): Promise<UrlRecord | null> {
    const res = await this.run(
      "lookup",
      `SELECT code, long_url, created_at FROM urls WHERE code = $1`,
      [code]
    );
    if (res.rows.length === 0) return null;
    return toRecord(res.rows[0]);
  }

  async list(): Promise<UrlRecord[]> {
    const res = await this.run(
      "list",
      `SELECT code, long_url, created_at FROM urls ORDER BY seq`
    );
    return res.rows.map(toRecord);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.client.end();
  }

  private async run(what: string, text: string, values?: unknown[]) {
    try {
      return await this.client.query(text, values);
    } catch (e) {
      throw wrap(what, e);
    }
  }
}

function wrap(what: string, cause: unknown): StorageError {
  return new StorageError(`postgres ${what} failed`, { cause });
}

function isUniqueViolation(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === UNIQUE_VIOLATION;
}

function toRecord(row: unknown): UrlRecord {
  if (typeof row !== "object" || row === null) {
    throw new StorageError("postgres returned no row");
  }
  if (!("code" in row) || !("long_url" in row) || !("created_at" in row)) {
    throw new StorageError("postgres returned a malformed row");
  }
  const { code, long_url, created_at } = row;
  if (typeof code !== "string" || typeof long_url !== "string") {
    throw new StorageError("postgres returned a malformed row");
  }
  const createdAt =
    created_at instanceof Date ? created_at.toISOString() : String(created_at ?? "");
  return { code, longUrl: long_url, createdAt };
}
