// services/pipeline.ts
// Wires the three pipeline steps to one loaded configuration.

import type { AppConfig } from "../schemas/config.schema.js";
import type { CalendarObject, ExtractedEvent, PublishResult } from "../types/events.js";
import type { FetchLike } from "../clients/ollama.js";
import type { AppLogger } from "../lib/logger.js";
import { extractEvent } from "./extractDate/llmEventExtractor.js";
import { buildCalendarObject, type BuildDeps } from "./calendar/eventBuilder.js";
import { publishEvent, type CalendarClientFactory } from "./calendar/caldavPublisher.js";

export interface EventPipeline {
  extract(text: string): Promise<ExtractedEvent>;
  build(event: ExtractedEvent): CalendarObject;
  publish(object: CalendarObject): Promise<PublishResult>;
}

export type PipelineDeps = BuildDeps & {
  fetchImpl?: FetchLike;
  createClient?: CalendarClientFactory;
  logger?: AppLogger;
};

export function createPipeline(config: AppConfig, deps: PipelineDeps = {}): EventPipeline {
  const { fetchImpl, createClient, logger, uid, now } = deps;
  return {
    extract: (text) =>
      extractEvent(text, config.ollama, { fetchImpl, now, logger: logger?.child({ component: "extractor" }) }),
    build: (event) => buildCalendarObject(event, { uid, now }),
    publish: (object) =>
      publishEvent(object, config.caldav, { createClient, logger: logger?.child({ component: "publisher" }) }),
  };
}
