// src/schemas/config.schema.ts
import { z } from "zod";

/* ============================== Sections ============================== */

const NonEmpty = z.string().trim().min(1, "must be a non-empty string");

export const DEFAULT_TIMEOUT_MS = 30_000;
const MIN_TIMEOUT_MS = 1_000;
const MAX_TIMEOUT_MS = 120_000;

export const OllamaSection = z.object({
  url: NonEmpty.url("must be a URL"),
  model: NonEmpty,
  timeout_ms: z
    .number()
    .int()
    .positive()
    .optional()
    .transform((n) => Math.max(MIN_TIMEOUT_MS, Math.min(n ?? DEFAULT_TIMEOUT_MS, MAX_TIMEOUT_MS))),
});

export const CaldavSection = z.object({
  url: NonEmpty.url("must be a URL"),
  username: NonEmpty,
  password: NonEmpty,
  calendar_name: NonEmpty,
});

/* ============================== Document ============================== */

export const AppConfigSchema = z.object({
  ollama: OllamaSection,
  caldav: CaldavSection,
});

export type ExtractionConfig = z.infer<typeof OllamaSection>;
export type PublishConfig = z.infer<typeof CaldavSection>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
