export const FALLBACK_EVENT_DESCRIPTION = "Other Sysmon event";

export const EVENT_DESCRIPTIONS: Readonly<Record<string, string>> = Object.freeze({
  "1": "Process created (a program started)",
  "2": "A process changed a file creation time",
  "3": "Network connection created",
  "4": "Sysmon service state changed",
  "5": "Process terminated (a program ended)",
  "6": "Driver loaded",
  "7": "Image (EXE/DLL) loaded",
  "8": "Remote thread created in another process",
  "9": "Raw disk access",
  "10": "Process accessed another process",
  "11": "File created on disk",
  "12": "Registry object created or deleted",
  "13": "Registry value set",
  "14": "Registry key/values renamed",
  "15": "File stream created",
  "22": "DNS query performed",
  "255": "Sysmon configuration change",
});

export function describeEventId(eventId: string | null | undefined): string {
  if (eventId === null || eventId === undefined || !Object.hasOwn(EVENT_DESCRIPTIONS, eventId)) {
    return FALLBACK_EVENT_DESCRIPTION;
  }
  return EVENT_DESCRIPTIONS[eventId];
}
