// =============================
// services/extractDate/llmEventExtractor.ts
// -----------------------------
// Text -> ExtractedEvent through Ollama.
// - Renders the instruction prompt with the current time
// - One request, no retry
// - Decodes the reply in two explicit steps (envelope, then payload)
// - Checks required keys, then types, with Zod
// =============================

import { z } from "zod";
import type { ExtractedEvent } from "../../types/events.js";
import type { ExtractionConfig } from "../../schemas/config.schema.js";
import { ollamaGenerateJSON, type FetchLike } from "../../clients/ollama.js";
import { MalformedResponseError, MissingFieldError, ValidationError, errorMessage } from "../../lib/errors.js";
import { silentLogger, type AppLogger } from "../../lib/logger.js";
import { buildSystemPrompt } from "./prompt.js";

// -------- Zod guards --------

const Envelope = z.object({ response: z.string() });

const Payload = z
  .object({
    summary: z.string(),
    start: z.string(),
    end: z.string(),
    location: z.string().nullish(),
    description: z.string().nullish(),
    rrule: z.string().nullish(),
    recurrenceRule: z.string().nullish(),
  })
  .transform(({ summary, start, end, location, description, rrule, recurrenceRule }): ExtractedEvent => {
    // null from the model means "not given"
    const event: ExtractedEvent = { summary, start, end };
    if (location != null) event.location = location;
    if (description != null) event.description = description;
    const rule = recurrenceRule ?? rrule;
    if (rule != null) event.recurrenceRule = rule;
    return event;
  });

export const REQUIRED_FIELDS = ["summary", "start", "end"] as const;

export type ExtractDeps = {
  fetchImpl?: FetchLike;
  now?: () => Date;
  logger?: AppLogger;
};

// -------- Decode steps --------

/** Step 1: the HTTP body is Ollama's JSON envelope with the generation in `response`. */
export function decodeEnvelope(body: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (e) {
    throw new MalformedResponseError(
      `Extraction service returned a body that is not JSON: ${errorMessage(e)}`,
      "envelope",
      { cause: e }
    );
  }

  const envelope = Envelope.safeParse(parsed);
  if (!envelope.success) {
    throw new MalformedResponseError(
      'Extraction service reply has no string "response" field',
      "envelope"
    );
  }
  return envelope.data.response;
}

/** Step 2: the generation itself must be a JSON object. */
export function decodePayload(generation: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(generation);
  } catch (e) {
    throw new MalformedResponseError(
      `Model output is not valid JSON: ${errorMessage(e)}`,
      "payload",
      { cause: e }
    );
  }

  if (!isPlainObject(parsed)) {
    throw new MalformedResponseError("Model output is not a JSON object", "payload");
  }
  return parsed;
}

/** Required keys first (MissingFieldError), then value types (MalformedResponseError). */
export function toExtractedEvent(payload: Record<string, unknown>): ExtractedEvent {
  const missing = REQUIRED_FIELDS.filter((key) => payload[key] === undefined || payload[key] === null);
  if (missing.length) throw new MissingFieldError([...missing]);

  const result = Payload.safeParse(payload);
  if (!result.success) {
    const fields = result.error.issues.map((i) => i.path.join(".")).join(", ");
    throw new MalformedResponseError(`Model output has values of the wrong type: ${fields}`, "payload");
  }
  return result.data;
}

// -------- Public API --------

export async function extractEvent(
  text: string,
  config: ExtractionConfig,
  deps: ExtractDeps = {}
): Promise<ExtractedEvent> {
  const raw = text.trim();
  if (!raw) throw new ValidationError("Please enter an event description.");

  const logger = deps.logger ?? silentLogger;
  const now = (deps.now ?? (() => new Date()))();

  logger.info("extract_request", { model: config.model, url: config.url, textLength: raw.length });

  const body = await ollamaGenerateJSON({
    baseUrl: config.url,
    model: config.model,
    system: buildSystemPrompt(now),
    prompt: raw,
    timeoutMs: config.timeout_ms,
    fetchImpl: deps.fetchImpl,
  });

  const event = toExtractedEvent(decodePayload(decodeEnvelope(body)));
  logger.debug("extract_result", { keys: Object.keys(event) });
  return event;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
