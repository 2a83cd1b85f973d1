// src/lib/http.ts
// Response envelope for the web UI's JSON API:
//   { ok: true, data } | { ok: false, error: { code, message, recoverable?, details? } }
// `recoverable: false` makes the page lock its controls.

import type { Response } from "express";
import { AppError, errorMessage } from "./errors.js";

const STATUS_BY_CODE: Record<string, number> = {
  E_BAD_INPUT: 422,
  E_BUSY: 409,
  E_STATE: 409,
  E_CONFIG: 503,
  E_LLM_UNREACHABLE: 502,
  E_LLM_MALFORMED: 502,
  E_LLM_MISSING_FIELD: 502,
  E_PUBLISH: 502,
  E_DATE_PARSE: 400,
  E_CALENDAR_NOT_FOUND: 400,
};

export function statusForCode(code: string | undefined): number {
  return (code && STATUS_BY_CODE[code]) || 500;
}

export function sendOk<T>(res: Response, data: T, status = 200) {
  return res.status(status).json({ ok: true, data });
}

export function sendErr(res: Response, code: string, message: string, details?: unknown, status = statusForCode(code)) {
  return res.status(status).json({
    ok: false,
    error: details === undefined ? { code, message } : { code, message, details },
  });
}

/** Send any thrown value; AppErrors keep their code, the rest become E_INTERNAL. */
export function sendError(res: Response, error: unknown, details?: unknown) {
  if (error instanceof AppError) {
    const body = details ?? error.context;
    return res.status(statusForCode(error.code)).json({
      ok: false,
      error: {
        code: error.code,
        message: error.message,
        recoverable: error.recoverable,
        ...(body === undefined ? {} : { details: body }),
      },
    });
  }
  return sendErr(res, "E_INTERNAL", errorMessage(error), details, 500);
}
