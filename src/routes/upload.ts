// src/routes/upload.ts
import { Router } from "express";
import multer from "multer";
import type { EventHandlers } from "../controller/eventController.js";

export const MAX_UPLOAD_BYTES = 2 * 1024 * 1024;

/**
 * Multer config:
 * - memoryStorage so the handler can read file.buffer
 * - one file, 2 MB
 */
const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: MAX_UPLOAD_BYTES, files: 1 },
});

/**
 * POST /api/upload
 * multipart/form-data with key "file" (.eml or .txt)
 * Responds with { ok, data: { text } } to prefill the text area.
 */
export function createUploadRouter(handlers: EventHandlers): Router {
  const router = Router();
  router.post("/", upload.single("file"), handlers.postUpload);
  return router;
}
