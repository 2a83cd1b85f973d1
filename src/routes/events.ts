// src/routes/events.ts
import { Router } from "express";
import type { EventHandlers } from "../controller/eventController.js";

/**
 * /api endpoints driving the interaction controller.
 * - GET  /state   current snapshot (or the configuration error)
 * - POST /parse   { text } -> extraction
 * - POST /create  publish the pending record
 * - POST /cancel  drop it
 * - POST /clear   same as cancel; the page also empties its text area
 */
export function createEventsRouter(handlers: EventHandlers): Router {
  const router = Router();
  router.get("/state", handlers.getState);
  router.post("/parse", handlers.postParse);
  router.post("/create", handlers.postCreate);
  router.post("/cancel", handlers.postCancel);
  router.post("/clear", handlers.postCancel);
  return router;
}
