import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import multer from "multer";
import { fileURLToPath } from "node:url";

import { createEventHandlers, type UiSession } from "./controller/eventController.js";
import { createEventsRouter } from "./routes/events.js";
import { createUploadRouter } from "./routes/upload.js";
import { sendErr } from "./lib/http.js";
import { errorMessage } from "./lib/errors.js";
import { silentLogger, type AppLogger } from "./lib/logger.js";

export const PUBLIC_DIR = fileURLToPath(new URL("../public", import.meta.url));

export function createApp(session: UiSession, logger: AppLogger = silentLogger): express.Express {
  const handlers = createEventHandlers(session);

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  app.use(express.static(PUBLIC_DIR));

  app.get("/api/healthz", (_req, res) => res.json({ ok: true }));

  app.use("/api/upload", createUploadRouter(handlers));
  app.use("/api", createEventsRouter(handlers));

  // Body-parser and multer failures land here
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      return sendErr(res, "E_BAD_INPUT", err.message, { field: err.field }, 422);
    }
    if (err instanceof SyntaxError) {
      return sendErr(res, "E_BAD_INPUT", "Request body is not valid JSON", undefined, 422);
    }
    logger.error("request_failed", { error: errorMessage(err) });
    return sendErr(res, "E_INTERNAL", errorMessage(err), undefined, 500);
  });

  return app;
}
