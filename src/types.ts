export type EventRecord = Readonly<{
  event_id: string | null;
  description: string;
  utc_time: string | null;
  image: string | null;
  process_id: string | null;
  computer: string | null;
}>;

export type EventTypeCount = Readonly<{
  event_id: string | null;
  description: string;
  count: number;
}>;

export interface SysmonReport {
  source: string;
  records: readonly EventRecord[];
  counts: readonly EventTypeCount[];
  suspicious: readonly EventRecord[];
}

export interface ConsoleLimits {
  topEventTypes: number;
  sampleEvents: number;
  suspiciousEvents: number;
}

export interface RuntimeConfig {
  inputFile: string;
  reportFile: string;
  console: ConsoleLimits;
}
