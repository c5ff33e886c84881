export const APP_NAME = "sysmon-report";

export const SYSMON_EVENT_NAMESPACE = "http://schemas.microsoft.com/win/2004/08/events/event";

export const DEFAULT_INPUT_FILE = "data/sysmon_events.xml";
export const DEFAULT_REPORT_FILE = "output/sysmon_report.txt";

export const DEFAULT_TOP_EVENT_TYPES = 10;
export const DEFAULT_SAMPLE_EVENTS = 5;
export const DEFAULT_SUSPICIOUS_EVENTS = 20;

export const REPORT_TITLE = "Sysmon Human-Readable Report";
export const REPORT_RULE_WIDTH = 40;
