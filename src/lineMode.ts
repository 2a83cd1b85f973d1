// Line-mode binding of the interaction controller: paste, review, confirm.

import type { InteractionController } from "./controller/interactionController.js";

export type LineModeIO = {
  /** Everything the user typed or piped, up to end-of-input. */
  readInput(): Promise<string>;
  /** One answer line, or null when there is no terminal to ask. */
  ask(question: string): Promise<string | null>;
  print(line: string): void;
};

export const CANCELLED = "Event creation cancelled by user.";

/** Resolves to the process exit code. */
export async function runLineMode(controller: InteractionController, io: LineModeIO): Promise<number> {
  io.print("Please paste the text describing the event and press Ctrl+D (or Ctrl+Z on Windows) when you are done.");
  io.print("-".repeat(20));

  const text = await io.readInput();
  if (!text.trim()) {
    io.print("No input received. Exiting.");
    return 0;
  }

  io.print("Asking the model to parse the event...");
  const parsed = await controller.submit(text);
  if (parsed.state !== "awaitingConfirmation" || !parsed.preview) {
    io.print(`Parsing failed: ${parsed.notice?.message ?? "no event details returned"}`);
    return 1;
  }

  io.print("\n--- Parsed Event Details ---");
  io.print(parsed.preview);
  io.print("--------------------------\n");

  const answer = await io.ask("Does this look correct? (y/n): ");
  if (answer === null || !answer.trim().toLowerCase().startsWith("y")) {
    controller.cancel();
    io.print(CANCELLED);
    return 0;
  }

  io.print("Creating event...");
  const published = await controller.confirm();
  if (published.state !== "done" || !published.result) {
    io.print(`Event creation failed: ${published.notice?.message ?? "unknown error"}`);
    return 1;
  }

  io.print("Event created successfully!");
  io.print(`Event Summary: ${published.result.confirmedSummary}`);
  io.print(`Calendar: ${published.result.calendarName}`);
  io.print(`URL: ${published.result.url}`);
  return 0;
}
