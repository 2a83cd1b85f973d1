// src/clients/ollama.ts
// Thin client for Ollama's /api/generate endpoint.
// Returns the raw response body; decoding is the extractor's job so each
// decode layer can fail on its own terms.

import { ServiceUnreachableError, errorMessage } from "../lib/errors.js";

export type FetchLike = typeof fetch;

export type GenerateRequest = {
  baseUrl: string;
  model: string;
  system: string;
  prompt: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
};

export function generateEndpoint(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/api/generate`;
}

/**
 * Single non-streamed, JSON-constrained completion.
 * Connection errors, timeouts and non-2xx statuses all become ServiceUnreachableError.
 */
export async function ollamaGenerateJSON(req: GenerateRequest): Promise<string> {
  const endpoint = generateEndpoint(req.baseUrl);
  const doFetch = req.fetchImpl ?? fetch;

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), req.timeoutMs);

  try {
    const resp = await doFetch(endpoint, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model: req.model,
        system: req.system,
        prompt: req.prompt,
        format: "json",
        stream: false,
      }),
      signal: controller.signal,
    });

    if (!resp.ok) {
      const detail = await resp.text().catch(() => "");
      throw new ServiceUnreachableError(
        `Extraction service at ${endpoint} answered HTTP ${resp.status}${detail ? `: ${detail.slice(0, 200)}` : ""}`,
        endpoint,
        resp.status
      );
    }

    return await resp.text();
  } catch (e) {
    if (e instanceof ServiceUnreachableError) throw e;
    const reason = controller.signal.aborted
      ? `timed out after ${req.timeoutMs}ms`
      : errorMessage(e);
    throw new ServiceUnreachableError(
      `Error connecting to extraction service at ${endpoint}: ${reason}`,
      endpoint,
      undefined,
      { cause: e }
    );
  } finally {
    clearTimeout(timeout);
  }
}
