import Fastify from "fastify";
import type { FastifyBaseLogger, FastifyError, FastifyInstance } from "fastify";
import helmet from "@fastify/helmet";
import { readFile } from "fs/promises";
import type { UrlStore } from "./storage.js";
import { ExhaustedError, StorageError, ValidationError } from "./errors.js";
import { isWellFormedCode } from "./short_code.js";
import { validateLongUrl } from "./validate_url.js";
import { getOrCreateRequestId } from "./request_id.js";
import {
  registry,
  httpRequestsTotal,
  httpRequestDurationSeconds,
  shortLinksCreatedTotal,
  shortLinkLookupsTotal
} from "./metrics.js";

export const DEFAULT_BODY_LIMIT_BYTES = 1024 * 16; // 16KB

export interface AppOptions {
  store: UrlStore;
  /** Public origin short links live under, without a trailing slash. */
  baseUrl: string;
  /** HTML file for `GET /`; read on every request. */
  indexPath?: string;
  logger?: FastifyBaseLogger;
  bodyLimitBytes?: number;
}

const replySchema = {
  type: "object",
  required: ["ok", "msg"],
  properties: {
    ok: { type: "boolean" },
    msg: { type: "string" }
  }
} as const;

export async function buildApp(opts: AppOptions): Promise<FastifyInstance> {
  const { store } = opts;

  const app = Fastify({
    loggerInstance: opts.logger,
    bodyLimit: opts.bodyLimitBytes ?? DEFAULT_BODY_LIMIT_BYTES,
    trustProxy: true,
    genReqId: (req) => getOrCreateRequestId(req.headers)
  });

  app.addHook("onRequest", async (req, reply) => {
    reply.header("X-Request-Id", req.id);
  });

  app.addHook("onResponse", async (req, reply) => {
    const labels = {
      method: req.method,
      route: req.routeOptions.url ?? "unknown",
      status_code: String(reply.statusCode)
    };
    httpRequestsTotal.inc(labels);
    httpRequestDurationSeconds.observe(labels, reply.elapsedTime / 1000);
  });

  await app.register(helmet, {
    // the index page is operator-supplied HTML
    contentSecurityPolicy: false
  });

  // The long URL arrives as the raw body, whatever the content type says.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser("*", { parseAs: "buffer" }, (_req, body, done) => {
    done(null, body);
  });

  app.post<{ Body: Buffer | undefined }>(
    "/put",
    {
      schema: {
        response: {
          201: replySchema,
          400: replySchema,
          500: replySchema
        }
      }
    },
    async (req, reply) => {
      const res = validateLongUrl(req.body);
      if (!res.ok) {
        return reply.code(400).send({ ok: false, msg: res.error });
      }

      const rec = await store.create(res.url);
      shortLinksCreatedTotal.inc();
      req.log.info({ code: rec.code, longUrl: rec.longUrl }, "stored short link");

      return reply
        .code(201)
        .header("Location", `${opts.baseUrl}/${rec.code}`)
        .send({ ok: true, msg: rec.code });
    }
  );

  app.get("/", async (req, reply) => {
    if (!opts.indexPath) return reply.code(404).send();

    let html: string;
    try {
      html = await readFile(opts.indexPath, "utf8");
    } catch (err) {
      req.log.warn({ err, indexPath: opts.indexPath }, "index page unreadable");
      return reply.code(404).send();
    }
    return reply.type("text/html; charset=utf-8").send(html);
  });

  app.get<{ Params: { code: string } }>("/:code", async (req, reply) => {
    const { code } = req.params;
    const rec = isWellFormedCode(code) ? await store.get(code) : null;

    if (!rec) {
      shortLinkLookupsTotal.inc({ result: "miss" });
      return reply.code(404).send();
    }

    shortLinkLookupsTotal.inc({ result: "hit" });
    req.log.debug({ code, longUrl: rec.longUrl }, "redirecting");
    return reply.redirect(rec.longUrl, 308);
  });

  app.setNotFoundHandler((_req, reply) => {
    return reply.code(404).send();
  });

  app.setErrorHandler((err: FastifyError, req, reply) => {
    if (err instanceof ValidationError) {
      return reply.code(400).send({ ok: false, msg: err.message });
    }

    req.log.error({ err }, "request failed");

    if (err instanceof ExhaustedError) {
      return reply.code(500).send({ ok: false, msg: "no free short code available" });
    }
    if (err instanceof StorageError) {
      return reply.code(500).send({ ok: false, msg: "problem with database" });
    }

    // Fastify's own client errors (body too large, malformed request)
    const statusCode = err.statusCode ?? 500;
    if (statusCode >= 400 && statusCode < 500) {
      return reply.code(statusCode).send({ ok: false, msg: err.message });
    }
    return reply.code(500).send({ ok: false, msg: "internal error" });
  });

  return app;
}

/** Prometheus scrape endpoint, served on its own port beside the gateway. */
export async function buildMetricsApp(logger?: FastifyBaseLogger): Promise<FastifyInstance> {
  const app = Fastify({ loggerInstance: logger });

  app.get("/metrics", async (_req, reply) => {
    try {
      const metrics = await registry.metrics();
      return reply.header("Content-Type", registry.contentType).code(200).send(metrics);
    } catch (err) {
      app.log.error({ err }, "metrics failed");
      return reply.code(500).send("metrics_error");
    }
  });

  return app;
}
