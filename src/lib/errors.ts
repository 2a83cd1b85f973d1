/**
 * Error taxonomy shared by the pipeline and both front ends.
 *
 * Every failure that reaches a user is an AppError with a stable `code`, so the
 * CLI and the HTTP layer can map it to a message or status without string
 * matching.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = true,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "AppError";
  }
}

/** Settings file missing, unreadable, or missing a required section/key. */
export class ConfigurationError extends AppError {
  constructor(message: string, public readonly issues: string[] = [], options?: { cause?: unknown }) {
    super(message, "E_CONFIG", false, { issues }, options);
    this.name = "ConfigurationError";
  }
}

/** Caller supplied unusable input (empty text, bad upload). */
export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "E_BAD_INPUT", true, context);
    this.name = "ValidationError";
  }
}

export class ServiceUnreachableError extends AppError {
  constructor(
    message: string,
    public readonly endpoint: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, "E_LLM_UNREACHABLE", true, { endpoint, status }, options);
    this.name = "ServiceUnreachableError";
  }
}

/** Which decode step rejected the extraction service reply. */
export type ResponseLayer = "envelope" | "payload";

export class MalformedResponseError extends AppError {
  constructor(message: string, public readonly layer: ResponseLayer, options?: { cause?: unknown }) {
    super(message, "E_LLM_MALFORMED", true, { layer }, options);
    this.name = "MalformedResponseError";
  }
}

export class MissingFieldError extends AppError {
  constructor(public readonly fields: string[]) {
    super(
      `Extraction result is missing required field(s): ${fields.join(", ")}`,
      "E_LLM_MISSING_FIELD",
      true,
      { fields }
    );
    this.name = "MissingFieldError";
  }
}

export class DateParseError extends AppError {
  constructor(public readonly field: string, public readonly value: string) {
    super(
      `Could not parse "${field}" value "${value}": expected YYYY-MM-DD HH:MM:SS`,
      "E_DATE_PARSE",
      true,
      { field, value }
    );
    this.name = "DateParseError";
  }
}

export class CalendarNotFoundError extends AppError {
  constructor(public readonly calendarName: string, public readonly available: string[]) {
    super(
      `Calendar "${calendarName}" not found. Available: ${available.length ? available.join(", ") : "(none)"}`,
      "E_CALENDAR_NOT_FOUND",
      true,
      { calendarName, available }
    );
    this.name = "CalendarNotFoundError";
  }
}

export class PublishError extends AppError {
  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, "E_PUBLISH", true, { status: options?.status }, { cause: options?.cause });
    this.name = "PublishError";
  }
}

/** Another extraction or publish is still in flight. */
export class BusyError extends AppError {
  constructor(public readonly operation: string) {
    super(`Busy: ${operation} already in progress`, "E_BUSY", true, { operation });
    this.name = "BusyError";
  }
}

/** Action not allowed from the controller's current state. */
export class InvalidStateError extends AppError {
  constructor(action: string, state: string) {
    super(`Cannot ${action} while ${state}`, "E_STATE", true, { action, state });
    this.name = "InvalidStateError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Normalize anything thrown into an AppError, keeping AppErrors as they are. */
export function toAppError(error: unknown, wrap: (message: string, cause: unknown) => AppError): AppError {
  if (error instanceof AppError) return error;
  return wrap(errorMessage(error), error);
}
