#!/usr/bin/env node
import { openSync } from "node:fs";
import { createInterface } from "node:readline/promises";
import { ReadStream } from "node:tty";

import { loadConfig, type AppConfig } from "./config/index.js";
import { InteractionController } from "./controller/interactionController.js";
import { createPipeline } from "./services/pipeline.js";
import { ConfigurationError, errorMessage } from "./lib/errors.js";
import { createLogger } from "./lib/logger.js";
import { runLineMode, type LineModeIO } from "./lineMode.js";

const logger = createLogger({ component: "cli" });

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

// stdin has been read to EOF by now, so the answer comes from the controlling terminal.
async function askTerminal(question: string): Promise<string | null> {
  let input: ReadStream;
  try {
    input = new ReadStream(openSync("/dev/tty", "r"));
  } catch (e) {
    logger.debug("no_terminal", { error: errorMessage(e) });
    return null;
  }

  const rl = createInterface({ input, output: process.stdout });
  const abort = new AbortController();
  rl.on("SIGINT", () => abort.abort());
  try {
    return await rl.question(question, { signal: abort.signal });
  } catch (e) {
    if (abort.signal.aborted) {
      process.stdout.write("\n");
      return null;
    }
    throw e;
  } finally {
    rl.close();
    input.destroy();
  }
}

const io: LineModeIO = {
  readInput: readStdin,
  ask: askTerminal,
  print: (line) => console.log(line),
};

async function main(): Promise<number> {
  let config: AppConfig;
  try {
    config = await loadConfig();
  } catch (e) {
    if (e instanceof ConfigurationError) {
      console.error(`Error: ${e.message}`);
      return 1;
    }
    throw e;
  }

  const controller = new InteractionController(createPipeline(config, { logger }), logger);
  return runLineMode(controller, io);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    console.error(`Unexpected error: ${errorMessage(e)}`);
    process.exitCode = 1;
  });
