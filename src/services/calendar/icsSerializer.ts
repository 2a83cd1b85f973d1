// services/calendar/icsSerializer.ts
import { createEvent, type EventAttributes } from "ics";
import type { CalendarObject } from "../../types/events.js";
import { PublishError } from "../../lib/errors.js";

export const PRODUCT_ID = "quickcal/ics";

export function toEventAttributes(object: CalendarObject): EventAttributes {
  const attributes: EventAttributes = {
    productId: PRODUCT_ID,
    uid: object.uid,
    // DTSTAMP and CREATED carry the build time, in UTC
    timestamp: object.createdAt.getTime(),
    created: object.createdAt.getTime(),
    title: object.summary,
    // Floating local time: the model speaks in the user's wall-clock time.
    // Epoch ms rather than date arrays, which have no seconds slot.
    start: object.start.getTime(),
    startInputType: "local",
    startOutputType: "local",
    end: object.end.getTime(),
    endInputType: "local",
    endOutputType: "local",
  };

  if (object.location !== undefined) attributes.location = object.location;
  if (object.description !== undefined) attributes.description = object.description;
  if (object.recurrenceRule !== undefined) attributes.recurrenceRule = object.recurrenceRule;

  return attributes;
}

/** Serialize one CalendarObject as a VCALENDAR containing a single VEVENT. */
export function toICalString(object: CalendarObject): string {
  const { error, value } = createEvent(toEventAttributes(object));
  if (error || !value) {
    throw new PublishError(`Could not serialize event "${object.summary}": ${error ? error.message : "empty output"}`, {
      cause: error ?? undefined,
    });
  }
  return value;
}
