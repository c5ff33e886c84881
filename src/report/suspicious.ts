import type { EventRecord } from "../types.js";

/** Binaries commonly abused for living-off-the-land techniques. */
export const SUSPICIOUS_IMAGES: readonly string[] = Object.freeze([
  "cmd.exe",
  "powershell.exe",
  "pwsh.exe",
  "wmic.exe",
  "rundll32.exe",
  "regsvr32.exe",
]);

const NEEDLES = SUSPICIOUS_IMAGES.map((name) => name.toLowerCase());

// Plain substring match: "not_cmd.exe_backup" counts as a hit.
export function isSuspicious(record: EventRecord): boolean {
  if (record.image === null) {
    return false;
  }
  const image = record.image.toLowerCase();
  return NEEDLES.some((needle) => image.includes(needle));
}

export function filterSuspicious(records: readonly EventRecord[]): EventRecord[] {
  return records.filter(isSuspicious);
}
