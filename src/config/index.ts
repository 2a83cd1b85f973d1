/**
 * @fileoverview Process settings and the JSON settings file.
 *
 * Environment (optionally from a .env file):
 * - CONFIG_PATH  settings file, relative to the working directory (default config.json)
 * - PORT         port for the web UI (default 4000)
 * - LOG_LEVEL    debug | info | warn | error (default warn, read by the logger)
 *
 * The settings file holds the `ollama` and `caldav` sections, see config.example.json.
 */

import "dotenv/config";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import type { ZodIssue } from "zod";
import { AppConfigSchema, type AppConfig } from "../schemas/config.schema.js";
import { ConfigurationError, errorMessage } from "../lib/errors.js";

export type { AppConfig, ExtractionConfig, PublishConfig } from "../schemas/config.schema.js";

function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  const parsed = raw ? parseInt(raw, 10) : NaN;
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

export const settings = {
  configPath: process.env.CONFIG_PATH || "config.json",
  port: optionalInt("PORT", 4000),
};

function describeIssue(issue: ZodIssue): string {
  const path = issue.path.length ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

/** Validate an already-decoded settings document. */
export function parseConfig(raw: unknown, source = "config"): AppConfig {
  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(describeIssue);
    throw new ConfigurationError(`Invalid ${source}:\n  - ${issues.join("\n  - ")}`, issues);
  }
  return result.data;
}

/** Read, decode and validate the settings file. Every failure is a ConfigurationError. */
export async function loadConfig(path: string = settings.configPath): Promise<AppConfig> {
  const fullPath = resolve(path);

  let text: string;
  try {
    text = await readFile(fullPath, "utf8");
  } catch (e) {
    const missing = e instanceof Error && "code" in e && e.code === "ENOENT";
    throw new ConfigurationError(
      missing ? `${path} not found.` : `Could not read ${path}: ${errorMessage(e)}`,
      [],
      { cause: e }
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ConfigurationError(`Could not decode ${path}. Please check its format.`, [], { cause: e });
  }

  return parseConfig(raw, path);
}
