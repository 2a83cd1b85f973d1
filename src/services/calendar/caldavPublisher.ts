// services/calendar/caldavPublisher.ts
// -----------------------------
// Stores a CalendarObject in the named collection of a CalDAV server.
// - Fresh login and calendar lookup on every publish
// - Exact display-name match, otherwise CalendarNotFoundError with the choices
// - Every failure surfaces as an AppError, never as a silent no-op
// =============================

import { DAVClient, type DAVCalendar } from "tsdav";
import type { CalendarObject, PublishResult } from "../../types/events.js";
import type { PublishConfig } from "../../schemas/config.schema.js";
import { CalendarNotFoundError, PublishError, toAppError } from "../../lib/errors.js";
import { silentLogger, type AppLogger } from "../../lib/logger.js";
import { toICalString } from "./icsSerializer.js";

/** The slice of tsdav's DAVClient this module relies on. */
export interface CalendarClient {
  login(): Promise<void>;
  fetchCalendars(): Promise<DAVCalendar[]>;
  createCalendarObject(params: {
    calendar: DAVCalendar;
    iCalString: string;
    filename: string;
  }): Promise<{ ok: boolean; status: number; statusText: string }>;
}

export type CalendarClientFactory = (config: PublishConfig) => CalendarClient;

export type PublishDeps = {
  createClient?: CalendarClientFactory;
  logger?: AppLogger;
};

export const createDavClient: CalendarClientFactory = (config) => {
  const client = new DAVClient({
    serverUrl: config.url,
    credentials: { username: config.username, password: config.password },
    authMethod: "Basic",
    defaultAccountType: "caldav",
  });
  return {
    login: () => client.login(),
    fetchCalendars: () => client.fetchCalendars(),
    createCalendarObject: (params) => client.createCalendarObject(params),
  };
};

export function calendarName(calendar: DAVCalendar): string {
  return typeof calendar.displayName === "string" ? calendar.displayName : "";
}

export function resourceUrl(collectionUrl: string, filename: string): string {
  return collectionUrl.endsWith("/") ? `${collectionUrl}${filename}` : `${collectionUrl}/${filename}`;
}

export function findCalendar(calendars: DAVCalendar[], name: string): DAVCalendar {
  const match = calendars.find((c) => calendarName(c) === name);
  if (!match) throw new CalendarNotFoundError(name, calendars.map(calendarName));
  return match;
}

export async function publishEvent(
  object: CalendarObject,
  config: PublishConfig,
  deps: PublishDeps = {}
): Promise<PublishResult> {
  const logger = deps.logger ?? silentLogger;
  const createClient = deps.createClient ?? createDavClient;

  try {
    const client = createClient(config);
    await client.login();

    const calendars = await client.fetchCalendars();
    const calendar = findCalendar(calendars, config.calendar_name);

    const filename = `${object.uid}.ics`;
    logger.info("publish_request", { calendar: config.calendar_name, uid: object.uid });

    const response = await client.createCalendarObject({
      calendar,
      iCalString: toICalString(object),
      filename,
    });
    if (!response.ok) {
      throw new PublishError(
        `CalDAV server rejected the event: HTTP ${response.status} ${response.statusText}`.trim(),
        { status: response.status }
      );
    }

    const url = resourceUrl(calendar.url, filename);
    logger.info("publish_ok", { url });
    return { url, confirmedSummary: object.summary, calendarName: calendarName(calendar) };
  } catch (e) {
    const error = toAppError(e, (message, cause) => new PublishError(`A CalDAV error occurred: ${message}`, { cause }));
    logger.warn("publish_failed", { code: error.code, error: error.message });
    throw error;
  }
}
