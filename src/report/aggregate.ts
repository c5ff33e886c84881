import type { EventRecord, EventTypeCount } from "../types.js";

/**
 * Counts records per (event_id, description) pair.
 *
 * Sorted by count descending, then event_id ascending (missing ids last),
 * then description. Records without an event_id are counted too, so the
 * counts always add up to `records.length`.
 */
export function countEventTypes(records: readonly EventRecord[]): EventTypeCount[] {
  const groups = new Map<string, { event_id: string | null; description: string; count: number }>();

  for (const record of records) {
    const key = JSON.stringify([record.event_id, record.description]);
    const group = groups.get(key);
    if (group) {
      group.count += 1;
    } else {
      groups.set(key, { event_id: record.event_id, description: record.description, count: 1 });
    }
  }

  return Array.from(groups.values()).sort(
    (a, b) =>
      b.count - a.count ||
      compareEventIds(a.event_id, b.event_id) ||
      compareStrings(a.description, b.description),
  );
}

function compareEventIds(a: string | null, b: string | null): number {
  if (a === b) {
    return 0;
  }
  if (a === null) {
    return 1;
  }
  if (b === null) {
    return -1;
  }
  return compareStrings(a, b);
}

// Code-unit order, so results do not depend on the host locale.
function compareStrings(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
