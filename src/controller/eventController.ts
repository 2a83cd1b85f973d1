// controller/eventController.ts
// HTTP handlers for the web UI. One InteractionController per server process;
// when the settings file could not be loaded every action answers 503 and the
// page locks its controls.

import type { Request, Response } from "express";
import { ParseBody } from "../schemas/extract.schema.js";
import { sendOk, sendErr, sendError } from "../lib/http.js";
import { textFromUpload } from "../services/emailText.js";
import { ConfigurationError } from "../lib/errors.js";
import type { ControllerSnapshot, InteractionController } from "./interactionController.js";

export type UiSession =
  | { controller: InteractionController; configError?: undefined }
  | { controller?: undefined; configError: string };

function respondWithSnapshot(res: Response, snapshot: ControllerSnapshot) {
  if (snapshot.notice?.kind === "error") {
    return sendErr(res, snapshot.notice.code ?? "E_INTERNAL", snapshot.notice.message, snapshot);
  }
  return sendOk(res, snapshot);
}

export function createEventHandlers(session: UiSession) {
  function withController(res: Response): InteractionController | undefined {
    if (session.controller) return session.controller;
    sendError(res, new ConfigurationError(session.configError));
    return undefined;
  }

  //get state
  function getState(_req: Request, res: Response) {
    if (!session.controller) return sendOk(res, { configError: session.configError });
    return sendOk(res, session.controller.snapshot());
  }

  //post parse
  async function postParse(req: Request, res: Response) {
    const controller = withController(res);
    if (!controller) return;

    const parsed = ParseBody.safeParse(req.body);
    if (!parsed.success) {
      return sendErr(res, "E_BAD_INPUT", "Invalid body", parsed.error.flatten(), 422);
    }

    try {
      return respondWithSnapshot(res, await controller.submit(parsed.data.text));
    } catch (e) {
      return sendError(res, e, controller.snapshot());
    }
  }

  //post create
  async function postCreate(_req: Request, res: Response) {
    const controller = withController(res);
    if (!controller) return;

    try {
      return respondWithSnapshot(res, await controller.confirm());
    } catch (e) {
      return sendError(res, e, controller.snapshot());
    }
  }

  //post cancel / clear
  function postCancel(_req: Request, res: Response) {
    const controller = withController(res);
    if (!controller) return;
    return sendOk(res, controller.cancel());
  }

  //post upload
  async function postUpload(req: Request, res: Response) {
    if (!req.file) {
      return sendErr(res, "E_BAD_INPUT", 'No file uploaded under field "file"', undefined, 422);
    }
    try {
      const text = await textFromUpload(req.file);
      return sendOk(res, { text });
    } catch (e) {
      return sendError(res, e);
    }
  }

  return { getState, postParse, postCreate, postCancel, postUpload };
}

export type EventHandlers = ReturnType<typeof createEventHandlers>;
