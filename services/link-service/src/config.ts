import { parseArgs } from "util";
import { isLogLevel, type LogLevel } from "./logger.js";
import { DEFAULT_CODE_LENGTH, DEFAULT_MAX_ATTEMPTS } from "./short_code.js";

export type StorageMode = "sqlite" | "postgres" | "memory";
const STORAGE_MODES: readonly StorageMode[] = ["sqlite", "postgres", "memory"];

export interface StoreConfig {
  storageMode: StorageMode;
  dbPath?: string;
  databaseUrl?: string;
  codeLength: number;
  maxAttempts: number;
}

export interface ServeConfig extends StoreConfig {
  host: string;
  port: number;
  baseUrl: string;
  indexPath?: string;
  logLevel: LogLevel;
  bodyLimitBytes: number;
  metricsPort?: number;
}

export type Command =
  | { kind: "serve"; config: ServeConfig }
  | { kind: "ls"; store: StoreConfig }
  | { kind: "help" };

export type Env = Record<string, string | undefined>;

export const USAGE = `Usage:
  link-service serve <db> [--listen host:port] [--url base-url] [--index file.html]
                          [--storage sqlite|postgres|memory] [--database-url url]
                          [--log-level level] [--body-limit bytes]
                          [--code-length n] [--max-attempts n] [--metrics-port port]
  link-service ls <db> [--storage sqlite|postgres] [--database-url url]`;

const DEFAULT_LISTEN = "127.0.0.1:8080";

function mustBeUrl(s: string): string {
  try {
    const u = new URL(s);
    if (u.protocol !== "http:" && u.protocol !== "https:") throw new Error("bad protocol");
    return s.replace(/\/+$/, "");
  } catch {
    throw new Error(`Invalid base URL: ${s}`);
  }
}

function intSetting(name: string, raw: string | undefined, fallback: number, min: number, max: number): number {
  if (raw === undefined || raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new Error(`Invalid ${name}: ${raw} (expected an integer from ${min} to ${max})`);
  }
  return n;
}

function parsePort(name: string, raw: string): number {
  if (raw.trim() === "") throw new Error(`Invalid ${name}: empty`);
  return intSetting(name, raw, 0, 1, 65535);
}

/** "host:port" or "[v6]:port". */
export function parseListen(raw: string): { host: string; port: number } {
  const i = raw.lastIndexOf(":");
  if (i <= 0) throw new Error(`Invalid listen address: ${raw} (expected host:port)`);
  const host = raw.slice(0, i).replace(/^\[(.*)\]$/, "$1");
  return { host, port: parsePort("listen port", raw.slice(i + 1)) };
}

function storeConfig(
  values: { storage?: string; "database-url"?: string; "code-length"?: string; "max-attempts"?: string },
  dbPath: string | undefined,
  env: Env
): StoreConfig {
  const databaseUrl = values["database-url"] ?? env.DATABASE_URL;
  const rawMode = values.storage ?? env.STORAGE_MODE;
  const storageMode = rawMode === undefined ? (databaseUrl ? "postgres" : "sqlite") : STORAGE_MODES.find((m) => m === rawMode);
  if (!storageMode) throw new Error(`Invalid storage mode: ${rawMode}`);

  if (storageMode === "sqlite" && !dbPath) {
    throw new Error("sqlite storage requires a database path");
  }
  if (storageMode === "postgres" && !databaseUrl) {
    throw new Error("postgres storage requires --database-url or DATABASE_URL");
  }

  return {
    storageMode,
    dbPath,
    databaseUrl,
    codeLength: intSetting("code length", values["code-length"] ?? env.CODE_LENGTH, DEFAULT_CODE_LENGTH, 4, 32),
    maxAttempts: intSetting("max attempts", values["max-attempts"] ?? env.CODE_MAX_ATTEMPTS, DEFAULT_MAX_ATTEMPTS, 1, 100)
  };
}

export function parseCommand(argv: string[], env: Env = process.env): Command {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      listen: { type: "string" },
      url: { type: "string" },
      index: { type: "string" },
      storage: { type: "string" },
      "database-url": { type: "string" },
      "log-level": { type: "string" },
      "body-limit": { type: "string" },
      "code-length": { type: "string" },
      "max-attempts": { type: "string" },
      "metrics-port": { type: "string" },
      help: { type: "boolean", short: "h" }
    }
  });

  const [command, dbArg, ...extra] = positionals;
  if (values.help || command === undefined || command === "help") return { kind: "help" };
  if (extra.length > 0) throw new Error(`Unexpected argument: ${extra[0]}`);

  const dbPath = dbArg ?? env.DB_PATH;

  if (command === "ls") {
    const store = storeConfig(values, dbPath, env);
    if (store.storageMode === "memory") throw new Error("ls needs a persistent store");
    return { kind: "ls", store };
  }
  if (command !== "serve") throw new Error(`Unknown command: ${command}`);

  let host: string;
  let port: number;
  if (values.listen !== undefined) {
    ({ host, port } = parseListen(values.listen));
  } else if (env.HOST !== undefined || env.PORT !== undefined) {
    const defaults = parseListen(DEFAULT_LISTEN);
    host = env.HOST ?? defaults.host;
    port = env.PORT !== undefined ? parsePort("PORT", env.PORT) : defaults.port;
  } else {
    ({ host, port } = parseListen(DEFAULT_LISTEN));
  }

  const hostForUrl = host.includes(":") ? `[${host}]` : host;
  const baseUrl = mustBeUrl(values.url ?? env.BASE_URL ?? `http://${hostForUrl}:${port}`);

  const logLevel = values["log-level"] ?? env.LOG_LEVEL ?? "info";
  if (!isLogLevel(logLevel)) throw new Error(`Invalid log level: ${logLevel}`);

  const rawMetricsPort = values["metrics-port"] ?? env.METRICS_PORT;

  return {
    kind: "serve",
    config: {
      ...storeConfig(values, dbPath, env),
      host,
      port,
      baseUrl,
      indexPath: values.index ?? env.INDEX_PATH,
      logLevel,
      bodyLimitBytes: intSetting("body limit", values["body-limit"] ?? env.BODY_LIMIT_BYTES, 1024 * 16, 1, 1024 * 1024 * 16),
      metricsPort: rawMetricsPort ? parsePort("metrics port", rawMetricsPort) : undefined
    }
  };
}
