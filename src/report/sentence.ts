import type { EventRecord } from "../types.js";

export const MISSING_VALUE = "None";

export function formatValue(value: string | number | null | undefined): string {
  return value === null || value === undefined ? MISSING_VALUE : String(value);
}

export function toSentence(record: EventRecord): string {
  return (
    `At ${formatValue(record.utc_time)}, on computer ${formatValue(record.computer)}, ` +
    `${record.description}: ${formatValue(record.image)} ` +
    `(process ID ${formatValue(record.process_id)}).`
  );
}
