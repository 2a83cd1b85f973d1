import { describe, it, expect } from "vitest";
import {
  InteractionController,
  formatPreview,
  type ControllerState,
} from "../../../src/controller/interactionController.js";
import {
  BusyError,
  CalendarNotFoundError,
  DateParseError,
  InvalidStateError,
  MissingFieldError,
  ServiceUnreachableError,
  ValidationError,
} from "../../../src/lib/errors.js";
import type { ExtractedEvent } from "../../../src/types/events.js";
import { PUBLISHED, TEAM_SYNC, deferred, stubPipeline } from "../../helpers/pipeline.js";

function setup() {
  const pipeline = stubPipeline();
  const controller = new InteractionController(pipeline);
  return { pipeline, controller };
}

describe("InteractionController", () => {
  it("starts idle and not busy", () => {
    expect(setup().controller.snapshot()).toEqual({ state: "idle", busy: false });
  });

  it("surfaces the extracted record for confirmation", async () => {
    const { controller, pipeline } = setup();

    const snap = await controller.submit("Team sync tomorrow 10am for 30 minutes");

    expect(pipeline.extract).toHaveBeenCalledWith("Team sync tomorrow 10am for 30 minutes");
    expect(snap.state).toBe("awaitingConfirmation");
    expect(snap.event).toEqual(TEAM_SYNC);
    expect(snap.preview).toBe(
      '{\n  "summary": "Team sync",\n  "start": "2024-06-02 10:00:00",\n  "end": "2024-06-02 10:30:00"\n}'
    );
    expect(pipeline.build).not.toHaveBeenCalled();
  });

  it("builds and publishes on confirmation, then clears the record", async () => {
    const { controller, pipeline } = setup();
    await controller.submit("Team sync");

    const snap = await controller.confirm();

    expect(pipeline.build).toHaveBeenCalledWith(TEAM_SYNC);
    expect(pipeline.publish).toHaveBeenCalledTimes(1);
    expect(snap).toEqual({
      state: "done",
      busy: false,
      result: PUBLISHED,
      notice: { kind: "success", message: "Event 'Team sync' created successfully!" },
    });
  });

  it("returns to idle when the extraction service is unreachable", async () => {
    const { controller, pipeline } = setup();
    pipeline.extract.mockRejectedValueOnce(
      new ServiceUnreachableError("Extraction service answered HTTP 500", "http://ollama.test/api/generate", 500)
    );

    const snap = await controller.submit("Team sync");

    expect(snap).toEqual({
      state: "idle",
      busy: false,
      notice: { kind: "error", message: "Extraction service answered HTTP 500", code: "E_LLM_UNREACHABLE" },
    });
    expect(pipeline.build).not.toHaveBeenCalled();
    expect(pipeline.publish).not.toHaveBeenCalled();
  });

  it("returns to idle when a required field is missing", async () => {
    const { controller, pipeline } = setup();
    pipeline.extract.mockRejectedValueOnce(new MissingFieldError(["start"]));

    const snap = await controller.submit("Lunch");

    expect(snap.state).toBe("idle");
    expect(snap.event).toBeUndefined();
    expect(snap.notice).toEqual({
      kind: "error",
      message: "Extraction result is missing required field(s): start",
      code: "E_LLM_MISSING_FIELD",
    });
  });

  it("makes no calendar call when the user rejects", async () => {
    const { controller, pipeline } = setup();
    await controller.submit("Team sync");

    const snap = controller.cancel();

    expect(snap).toEqual({ state: "idle", busy: false });
    expect(pipeline.build).not.toHaveBeenCalled();
    expect(pipeline.publish).not.toHaveBeenCalled();
  });

  it("keeps the record after a failed publish so it can be retried", async () => {
    const { controller, pipeline } = setup();
    pipeline.publish.mockRejectedValueOnce(new CalendarNotFoundError("Personal", ["Home", "Work", "Travel"]));
    await controller.submit("Team sync");

    const failed = await controller.confirm();
    expect(failed.state).toBe("awaitingConfirmation");
    expect(failed.event).toEqual(TEAM_SYNC);
    expect(failed.notice).toEqual({
      kind: "error",
      message: 'Calendar "Personal" not found. Available: Home, Work, Travel',
      code: "E_CALENDAR_NOT_FOUND",
    });

    const retried = await controller.confirm();
    expect(retried.state).toBe("done");
    expect(pipeline.extract).toHaveBeenCalledTimes(1);
  });

  it("keeps the record when a timestamp cannot be parsed", async () => {
    const { controller, pipeline } = setup();
    pipeline.build.mockImplementationOnce(() => {
      throw new DateParseError("start", "tomorrow");
    });
    await controller.submit("Team sync");

    const snap = await controller.confirm();

    expect(snap.state).toBe("awaitingConfirmation");
    expect(snap.notice?.code).toBe("E_DATE_PARSE");
    expect(pipeline.publish).not.toHaveBeenCalled();
  });

  it("wraps unexpected failures without losing the message", async () => {
    const { controller, pipeline } = setup();
    pipeline.publish.mockRejectedValueOnce(new Error("socket hang up"));
    await controller.submit("Team sync");

    const snap = await controller.confirm();

    expect(snap.notice).toEqual({ kind: "error", message: "socket hang up", code: "E_INTERNAL" });
  });

  it("rejects empty text without leaving idle", async () => {
    const { controller, pipeline } = setup();
    await expect(controller.submit(" \n\t")).rejects.toBeInstanceOf(ValidationError);
    expect(controller.snapshot().state).toBe("idle");
    expect(pipeline.extract).not.toHaveBeenCalled();
  });

  it("refuses to publish without a pending record", async () => {
    const { controller } = setup();
    await expect(controller.confirm()).rejects.toBeInstanceOf(InvalidStateError);
  });

  it("rejects a second operation while one is in flight", async () => {
    const { controller, pipeline } = setup();
    const pending = deferred<ExtractedEvent>();
    pipeline.extract.mockReturnValueOnce(pending.promise);

    const first = controller.submit("Team sync");
    expect(controller.snapshot()).toEqual({ state: "extracting", busy: true });
    await expect(controller.submit("Another")).rejects.toBeInstanceOf(BusyError);
    await expect(controller.confirm()).rejects.toBeInstanceOf(BusyError);

    pending.resolve({ ...TEAM_SYNC });
    expect((await first).state).toBe("awaitingConfirmation");
    expect(pipeline.extract).toHaveBeenCalledTimes(1);
  });

  it("discards the result of an extraction cancelled mid-flight", async () => {
    const { controller, pipeline } = setup();
    const pending = deferred<ExtractedEvent>();
    pipeline.extract.mockReturnValueOnce(pending.promise);

    const first = controller.submit("Team sync");
    expect(controller.cancel()).toEqual({ state: "idle", busy: true });
    await expect(controller.submit("Other")).rejects.toBeInstanceOf(BusyError);

    pending.resolve({ ...TEAM_SYNC });
    expect(await first).toEqual({ state: "idle", busy: false });
  });

  it("accepts a new extraction after done", async () => {
    const { controller, pipeline } = setup();
    await controller.submit("Team sync");
    await controller.confirm();

    const snap = await controller.submit("Dentist Friday 3pm");

    expect(snap.state).toBe("awaitingConfirmation");
    expect(pipeline.extract).toHaveBeenLastCalledWith("Dentist Friday 3pm");
  });

  it("notifies listeners of each transition until unsubscribed", async () => {
    const { controller } = setup();
    const seen: ControllerState[] = [];
    const unsubscribe = controller.onChange((snap) => seen.push(snap.state));

    await controller.submit("Team sync");
    await controller.confirm();
    unsubscribe();
    controller.cancel();

    expect(seen).toEqual(["extracting", "awaitingConfirmation", "publishing", "done"]);
  });
});

describe("formatPreview", () => {
  it("indents with two spaces and keeps optional keys", () => {
    expect(formatPreview({ ...TEAM_SYNC, location: "Room 204" })).toContain('\n  "location": "Room 204"\n');
  });
});
