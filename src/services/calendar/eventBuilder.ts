// services/calendar/eventBuilder.ts
// ExtractedEvent -> CalendarObject. No I/O; uid and clock are injectable.

import { randomUUID } from "node:crypto";
import { format, isValid, parse } from "date-fns";
import type { CalendarObject, ExtractedEvent } from "../../types/events.js";
import { DateParseError } from "../../lib/errors.js";
import { TIMESTAMP_PATTERN } from "../extractDate/prompt.js";

export type BuildDeps = {
  uid?: () => string;
  now?: () => Date;
};

/**
 * Parse a floating "YYYY-MM-DD HH:MM:SS" value in the host time zone.
 * The value must format back to itself: this rejects single-digit fields,
 * which date-fns accepts, and wall-clock times skipped by a DST change.
 */
export function parseTimestamp(field: string, value: string): Date {
  const date = parse(value, TIMESTAMP_PATTERN, new Date(0));
  if (!isValid(date) || format(date, TIMESTAMP_PATTERN) !== value) {
    throw new DateParseError(field, value);
  }
  return date;
}

export function buildCalendarObject(event: ExtractedEvent, deps: BuildDeps = {}): CalendarObject {
  const start = parseTimestamp("start", event.start);
  const end = parseTimestamp("end", event.end);

  const object: {
    -readonly [K in keyof CalendarObject]: CalendarObject[K];
  } = {
    uid: (deps.uid ?? randomUUID)(),
    createdAt: (deps.now ?? (() => new Date()))(),
    summary: event.summary,
    start,
    end,
  };

  if (event.location !== undefined) object.location = event.location;
  if (event.description !== undefined) object.description = event.description;
  if (event.recurrenceRule !== undefined) object.recurrenceRule = event.recurrenceRule;

  return Object.freeze(object);
}
