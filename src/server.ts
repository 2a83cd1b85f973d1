import { settings, loadConfig } from "./config/index.js";
import { createApp } from "./app.js";
import { InteractionController } from "./controller/interactionController.js";
import type { UiSession } from "./controller/eventController.js";
import { createPipeline } from "./services/pipeline.js";
import { ConfigurationError, errorMessage } from "./lib/errors.js";
import { createLogger } from "./lib/logger.js";

const logger = createLogger({ component: "server" });

async function createSession(): Promise<UiSession> {
  try {
    const config = await loadConfig();
    const pipeline = createPipeline(config, { logger });
    return { controller: new InteractionController(pipeline, logger.child({ component: "controller" })) };
  } catch (e) {
    if (!(e instanceof ConfigurationError)) throw e;
    // The page shows this in a dialog and keeps its controls locked.
    logger.error("config_invalid", { error: e.message });
    return { configError: e.message };
  }
}

async function main(): Promise<void> {
  const app = createApp(await createSession(), logger);
  app.listen(settings.port, () => {
    console.log(`quickcal UI on http://localhost:${settings.port}`);
  });
}

main().catch((e: unknown) => {
  logger.error("startup_failed", { error: errorMessage(e) });
  process.exitCode = 1;
});
