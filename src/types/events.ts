//  ExtractedEvent: what the language model hands back
// -----------------------------
// - Built fresh for every request and dropped after publish or cancel.
// - `start` / `end` are kept as the raw "YYYY-MM-DD HH:MM:SS" text the model
//   produced; the builder is the one place that parses them.
// - Optional keys are absent when the model omitted them (never "").
// =============================
export type ExtractedEvent = {
    /** Short human-readable title, becomes the iCalendar SUMMARY */
    summary: string;

    /** Start time as produced by the model, e.g. "2024-06-02 10:00:00" */
    start: string;

    /** End time, same format. Not checked against `start`. */
    end: string;

    location?: string;

    description?: string;

    /** RRULE value without the "RRULE:" prefix, e.g. "FREQ=WEEKLY;BYDAY=MO" */
    recurrenceRule?: string;
};


//  CalendarObject: one event ready to be serialized and stored
// -----------------------------
// - `uid` is generated per object and never reused.
// - `createdAt` is the moment of building, not the event time.
// - Frozen by the builder.
// =============================
export type CalendarObject = {
    readonly uid: string;
    readonly createdAt: Date;
    readonly summary: string;
    readonly start: Date;
    readonly end: Date;
    readonly location?: string;
    readonly description?: string;
    readonly recurrenceRule?: string;
};


//  PublishResult: what the calendar server confirmed
// =============================
export type PublishResult = {
    /** Resource location of the stored object on the CalDAV server */
    url: string;

    /** Summary of the stored event, echoed back for the success message */
    confirmedSummary: string;

    /** Display name of the collection that received the event */
    calendarName: string;
};
