import { SYSMON_EVENT_NAMESPACE } from "../constants.js";
import type { EventRecord } from "../types.js";

export interface EventFixture {
  eventId?: string;
  computer?: string;
  data?: Record<string, string>;
  omitSystem?: boolean;
  omitEventData?: boolean;
}

export function eventXml(fixture: EventFixture = {}): string {
  const system = fixture.omitSystem
    ? ""
    : [
        "<System>",
        fixture.eventId === undefined ? "" : `<EventID>${fixture.eventId}</EventID>`,
        fixture.computer === undefined ? "" : `<Computer>${fixture.computer}</Computer>`,
        "</System>",
      ].join("");

  const eventData = fixture.omitEventData
    ? ""
    : [
        "<EventData>",
        ...Object.entries(fixture.data ?? {}).map(([name, value]) => `<Data Name="${name}">${value}</Data>`),
        "</EventData>",
      ].join("");

  return `<Event>${system}${eventData}</Event>`;
}

export function eventsDocument(events: readonly string[]): string {
  return [
    '<?xml version="1.0" encoding="utf-8"?>',
    `<Events xmlns="${SYSMON_EVENT_NAMESPACE}">`,
    ...events,
    "</Events>",
  ].join("\n");
}

export function makeRecord(overrides: Partial<EventRecord> = {}): EventRecord {
  return {
    event_id: "1",
    description: "Process created (a program started)",
    utc_time: "2024-01-01T00:00:00Z",
    image: "C:\\Windows\\System32\\notepad.exe",
    process_id: "100",
    computer: "HOST1",
    ...overrides,
  };
}
