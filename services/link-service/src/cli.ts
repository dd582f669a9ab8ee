#!/usr/bin/env node
import { parseCommand, USAGE, type Command, type ServeConfig } from "./config.js";
import { runListing } from "./list.js";
import { startServer } from "./serve.js";

async function serve(config: ServeConfig): Promise<void> {
  const running = await startServer(config);

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      running.logger.info({ signal }, "shutting down");
      running.close().then(
        () => process.exit(0),
        (err: unknown) => {
          running.logger.error({ err }, "shutdown failed");
          process.exit(1);
        }
      );
    });
  }
}

async function main(argv: string[]): Promise<number> {
  let command: Command;
  try {
    command = parseCommand(argv, process.env);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`${msg}\n\n${USAGE}\n`);
    return 1;
  }

  switch (command.kind) {
    case "help":
      process.stdout.write(`${USAGE}\n`);
      return 0;
    case "ls":
      return runListing(command.store, {
        out: (line) => process.stdout.write(`${line}\n`),
        err: (line) => process.stderr.write(`${line}\n`)
      });
    case "serve":
      await serve(command.config);
      return 0;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
    process.exitCode = 1;
  }
);
