import type { StoreConfig } from "./config.js";
import type { UrlStore } from "./storage.js";
import { buildStore, describeStore } from "./build_store.js";
import { isFile } from "./files.js";

export interface ListingOutput {
  out: (line: string) => void;
  err: (line: string) => void;
}

/**
 * Operator listing: a count header, then one `code -> url` line per mapping.
 * Returns the number of mappings written.
 */
export async function printListing(
  store: UrlStore,
  source: string,
  write: (line: string) => void
): Promise<number> {
  const records = await store.list();
  const n = records.length;

  write(`${n} mapping${n === 1 ? "" : "s"} found in ${source}:`);
  for (const rec of records) {
    write(`  ${rec.code} -> ${rec.longUrl}`);
  }
  return n;
}

/** `ls <db>`: resolves to the process exit code. */
export async function runListing(config: StoreConfig, io: ListingOutput): Promise<number> {
  if (config.storageMode === "sqlite" && config.dbPath !== undefined && !isFile(config.dbPath)) {
    io.err(`database file does not exist or is not a file: ${config.dbPath}`);
    return 1;
  }

  const store = buildStore(config, { mustExist: true });
  await store.init();
  try {
    await printListing(store, describeStore(config), io.out);
  } finally {
    await store.close();
  }
  return 0;
}
