/**
 * Interaction state machine shared by the CLI and the web UI.
 *
 *   idle -> extracting -> awaitingConfirmation -> publishing -> done
 *
 * - A failed extraction goes back to idle and keeps nothing.
 * - A failed publish goes back to awaitingConfirmation with the record intact,
 *   so the user can retry without extracting again.
 * - cancel() returns to idle from anywhere. An operation still in flight keeps
 *   running, but its result is discarded and it still counts as busy.
 * - Only one operation runs at a time; a second request fails with BusyError.
 */

import type { ExtractedEvent, PublishResult } from "../types/events.js";
import type { EventPipeline } from "../services/pipeline.js";
import {
  AppError,
  BusyError,
  InvalidStateError,
  ValidationError,
  toAppError,
} from "../lib/errors.js";
import { silentLogger, type AppLogger } from "../lib/logger.js";

export type ControllerState = "idle" | "extracting" | "awaitingConfirmation" | "publishing" | "done";

export type Operation = "extraction" | "publish";

export type Notice = {
  kind: "error" | "success";
  message: string;
  code?: string;
};

export type ControllerSnapshot = {
  state: ControllerState;
  busy: boolean;
  event?: ExtractedEvent;
  preview?: string;
  notice?: Notice;
  result?: PublishResult;
};

export type StateListener = (snapshot: ControllerSnapshot) => void;

/** The record as shown to the user for confirmation. */
export function formatPreview(event: ExtractedEvent): string {
  return JSON.stringify(event, null, 2);
}

function errorNotice(error: AppError): Notice {
  return { kind: "error", message: error.message, code: error.code };
}

function unexpected(message: string, cause: unknown): AppError {
  return new AppError(message, "E_INTERNAL", true, undefined, { cause });
}

export class InteractionController {
  private state: ControllerState = "idle";
  private event?: ExtractedEvent;
  private notice?: Notice;
  private result?: PublishResult;
  private inFlight: Operation | null = null;
  private generation = 0;
  private readonly listeners = new Set<StateListener>();

  constructor(
    private readonly pipeline: EventPipeline,
    private readonly logger: AppLogger = silentLogger
  ) {}

  snapshot(): ControllerSnapshot {
    const snap: ControllerSnapshot = { state: this.state, busy: this.inFlight !== null };
    if (this.event) {
      snap.event = { ...this.event };
      snap.preview = formatPreview(this.event);
    }
    if (this.notice) snap.notice = { ...this.notice };
    if (this.result) snap.result = { ...this.result };
    return snap;
  }

  onChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Start an extraction. Resolves once it settled; failures land in `notice`. */
  async submit(text: string): Promise<ControllerSnapshot> {
    this.assertNotBusy();
    const raw = text.trim();
    if (!raw) throw new ValidationError("Please enter an event description.");

    const generation = ++this.generation;
    this.inFlight = "extraction";
    this.transition("extracting", {});

    try {
      const event = await this.pipeline.extract(raw);
      if (generation === this.generation) {
        this.transition("awaitingConfirmation", { event });
      }
    } catch (e) {
      const error = toAppError(e, unexpected);
      this.logger.warn("extraction_failed", { code: error.code, error: error.message });
      if (generation === this.generation) {
        this.transition("idle", { notice: errorNotice(error) });
      }
    } finally {
      this.inFlight = null;
    }
    return this.snapshot();
  }

  /** Build and publish the pending record. Failures keep the record for another try. */
  async confirm(): Promise<ControllerSnapshot> {
    this.assertNotBusy();
    const event = this.event;
    if (this.state !== "awaitingConfirmation" || !event) {
      throw new InvalidStateError("create an event", `in state "${this.state}"`);
    }

    const generation = ++this.generation;
    this.inFlight = "publish";
    this.transition("publishing", { event });

    try {
      const object = this.pipeline.build(event);
      const result = await this.pipeline.publish(object);
      if (generation === this.generation) {
        this.transition("done", {
          result,
          notice: { kind: "success", message: `Event '${result.confirmedSummary}' created successfully!` },
        });
      }
    } catch (e) {
      const error = toAppError(e, unexpected);
      this.logger.warn("publish_failed", { code: error.code, error: error.message });
      if (generation === this.generation) {
        this.transition("awaitingConfirmation", { event, notice: errorNotice(error) });
      }
    } finally {
      this.inFlight = null;
    }
    return this.snapshot();
  }

  /** Drop the pending record and return to idle. Makes no network call. */
  cancel(): ControllerSnapshot {
    this.generation++;
    this.transition("idle", {});
    return this.snapshot();
  }

  private assertNotBusy(): void {
    if (this.inFlight) throw new BusyError(this.inFlight);
  }

  private transition(
    next: ControllerState,
    fields: { event?: ExtractedEvent; notice?: Notice; result?: PublishResult }
  ): void {
    this.logger.debug("state_change", { from: this.state, to: next });
    this.state = next;
    this.event = fields.event;
    this.notice = fields.notice;
    this.result = fields.result;

    const snap = this.snapshot();
    for (const listener of this.listeners) {
      try {
        listener(snap);
      } catch (e) {
        this.logger.error("state_listener_failed", { error: e });
      }
    }
  }
}
