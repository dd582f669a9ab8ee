import type { FastifyInstance } from "fastify";
import type { Logger } from "pino";
import type { ServeConfig } from "./config.js";
import type { UrlStore } from "./storage.js";
import { buildApp, buildMetricsApp } from "./app.js";
import { buildStore, describeStore } from "./build_store.js";
import { isFile } from "./files.js";
import { createLogger } from "./logger.js";

export interface RunningServer {
  app: FastifyInstance;
  metricsApp?: FastifyInstance;
  logger: Logger;
  /** Stops both listeners, then the store. */
  close(): Promise<void>;
}

/**
 * Opens the store and binds the listeners. If any step fails, whatever was
 * already started is closed before the error is rethrown.
 */
export async function startServer(config: ServeConfig, store: UrlStore = buildStore(config)): Promise<RunningServer> {
  const logger = createLogger(config.logLevel);

  if (config.indexPath && !isFile(config.indexPath)) {
    logger.warn({ indexPath: config.indexPath }, "index file does not exist or is not a file; GET / will return 404");
  }

  let app: FastifyInstance | undefined;
  let metricsApp: FastifyInstance | undefined;
  const close = async () => {
    await app?.close();
    await metricsApp?.close();
    await store.close();
  };

  try {
    await store.init();

    app = await buildApp({
      store,
      baseUrl: config.baseUrl,
      indexPath: config.indexPath,
      logger,
      bodyLimitBytes: config.bodyLimitBytes
    });

    // metrics bind first so a gateway is never left serving after a failed start
    if (config.metricsPort !== undefined) {
      metricsApp = await buildMetricsApp(logger);
      await metricsApp.listen({ port: config.metricsPort, host: config.host });
    }
    await app.listen({ port: config.port, host: config.host });

    logger.info(
      {
        host: config.host,
        port: config.port,
        baseUrl: config.baseUrl,
        storageMode: config.storageMode,
        store: describeStore(config),
        metricsPort: config.metricsPort
      },
      "link-service started"
    );

    return { app, metricsApp, logger, close };
  } catch (err) {
    logger.error({ err }, "start-up failed");
    await close();
    throw err;
  }
}
