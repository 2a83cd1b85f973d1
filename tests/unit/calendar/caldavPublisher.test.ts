import { describe, it, expect, vi } from "vitest";
import {
  findCalendar,
  publishEvent,
  resourceUrl,
} from "../../../src/services/calendar/caldavPublisher.js";
import { CalendarNotFoundError, PublishError } from "../../../src/lib/errors.js";
import type { CalendarObject } from "../../../src/types/events.js";
import { FakeCalendarClient, TEST_CONFIG, calendar } from "../../helpers/fakes.js";

const object: CalendarObject = {
  uid: "uid-42",
  createdAt: new Date(2024, 5, 1, 8, 0, 0),
  summary: "Team sync",
  start: new Date(2024, 5, 2, 10, 0, 0),
  end: new Date(2024, 5, 2, 10, 30, 0),
};

function setup(calendars = [calendar("Home"), calendar("Work"), calendar("Travel")]) {
  const client = new FakeCalendarClient(calendars);
  const createClient = vi.fn(() => client);
  return { client, createClient };
}

describe("publishEvent", () => {
  it("stores the event in the named calendar and echoes the summary", async () => {
    const { client, createClient } = setup();

    const result = await publishEvent(object, TEST_CONFIG.caldav, { createClient });

    expect(createClient).toHaveBeenCalledWith(TEST_CONFIG.caldav);
    expect(client.login).toHaveBeenCalledTimes(1);
    expect(result).toEqual({
      url: "https://dav.test/calendars/tester/work/uid-42.ics",
      confirmedSummary: "Team sync",
      calendarName: "Work",
    });
    expect(client.stored).toHaveLength(1);
    expect(client.stored[0].filename).toBe("uid-42.ics");
    expect(client.stored[0].calendar.displayName).toBe("Work");
    expect(client.stored[0].iCalString).toMatch(/^SUMMARY:Team sync\r?$/m);
  });

  it("lists the available calendars when the name does not match", async () => {
    const { client, createClient } = setup();
    const config = { ...TEST_CONFIG.caldav, calendar_name: "Personal" };

    const promise = publishEvent(object, config, { createClient });

    await expect(promise).rejects.toBeInstanceOf(CalendarNotFoundError);
    await expect(promise).rejects.toMatchObject({
      available: ["Home", "Work", "Travel"],
      message: 'Calendar "Personal" not found. Available: Home, Work, Travel',
    });
    expect(client.createCalendarObject).not.toHaveBeenCalled();
  });

  it("matches the display name exactly", async () => {
    const { createClient } = setup([calendar("work")]);
    await expect(publishEvent(object, TEST_CONFIG.caldav, { createClient })).rejects.toMatchObject({
      available: ["work"],
    });
  });

  it("wraps a login failure in PublishError", async () => {
    const { client, createClient } = setup();
    const cause = new Error("401 Unauthorized");
    client.loginError = cause;

    const promise = publishEvent(object, TEST_CONFIG.caldav, { createClient });

    await expect(promise).rejects.toBeInstanceOf(PublishError);
    await expect(promise).rejects.toMatchObject({ message: "A CalDAV error occurred: 401 Unauthorized", cause });
    expect(client.fetchCalendars).not.toHaveBeenCalled();
  });

  it("reports a rejected PUT with its status", async () => {
    const { client, createClient } = setup();
    client.response = { ok: false, status: 403, statusText: "Forbidden" };

    await expect(publishEvent(object, TEST_CONFIG.caldav, { createClient })).rejects.toMatchObject({
      name: "PublishError",
      message: "CalDAV server rejected the event: HTTP 403 Forbidden",
      context: { status: 403 },
    });
  });
});

describe("findCalendar", () => {
  it("reports an empty account", () => {
    expect(() => findCalendar([], "Work")).toThrow('Calendar "Work" not found. Available: (none)');
  });
});

describe("resourceUrl", () => {
  it("joins with exactly one slash", () => {
    expect(resourceUrl("https://dav.test/cal/", "a.ics")).toBe("https://dav.test/cal/a.ics");
    expect(resourceUrl("https://dav.test/cal", "a.ics")).toBe("https://dav.test/cal/a.ics");
  });
});
