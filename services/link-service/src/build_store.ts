import type { StoreConfig } from "./config.js";
import type { UrlStore } from "./storage.js";
import { MemoryUrlStore } from "./storage_memory.js";
import { SqliteUrlStore } from "./storage_sqlite.js";
import { PostgresUrlStore, createPgClient } from "./storage_postgres.js";
import { createCodeGenerator } from "./short_code.js";

export function buildStore(config: StoreConfig, opts: { mustExist?: boolean } = {}): UrlStore {
  const codes = {
    generate: createCodeGenerator(config.codeLength),
    maxAttempts: config.maxAttempts
  };

  switch (config.storageMode) {
    case "postgres":
      if (!config.databaseUrl) throw new Error("postgres storage requires a database URL");
      return new PostgresUrlStore(createPgClient(config.databaseUrl), codes);
    case "sqlite":
      if (!config.dbPath) throw new Error("sqlite storage requires a database path");
      return new SqliteUrlStore(config.dbPath, { ...codes, mustExist: opts.mustExist });
    case "memory":
      return new MemoryUrlStore(codes);
  }
}

/** Where the store lives, for log lines and the listing header. */
export function describeStore(config: StoreConfig): string {
  switch (config.storageMode) {
    case "postgres":
      return config.databaseUrl ? redactPassword(config.databaseUrl) : "postgres";
    case "sqlite":
      return config.dbPath ?? "sqlite";
    case "memory":
      return "memory";
  }
}

function redactPassword(databaseUrl: string): string {
  try {
    const u = new URL(databaseUrl);
    if (u.password) u.password = "***";
    return u.toString();
  } catch {
    return "postgres";
  }
}
