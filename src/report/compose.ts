import type { Element } from "@xmldom/xmldom";

import { REPORT_RULE_WIDTH, REPORT_TITLE } from "../constants.js";
import { parseEvents } from "../events/extract.js";
import type { ConsoleLimits, EventRecord, SysmonReport } from "../types.js";
import { countEventTypes } from "./aggregate.js";
import { toSentence } from "./sentence.js";
import { filterSuspicious } from "./suspicious.js";
import { renderTable } from "./table.js";

const COUNT_COLUMNS = ["event_id", "description", "count"] as const;
const SUSPICIOUS_COLUMNS = ["utc_time", "description", "image", "process_id"] as const;

export function buildSysmonReport(source: string, events: Iterable<Element>): SysmonReport {
  const records = parseEvents(events);
  return {
    source,
    records,
    counts: countEventTypes(records),
    suspicious: filterSuspicious(records),
  };
}

export function renderReportText(report: SysmonReport): string {
  const parts = [
    `${REPORT_TITLE}\n`,
    `${"=".repeat(REPORT_RULE_WIDTH)}\n\n`,
    "Top event types:\n",
    renderTable(COUNT_COLUMNS, report.counts),
    "\n\nInteresting / potentially suspicious events:\n",
    ...bullets(report.suspicious),
    "\nAll events (full log in sentences):\n",
    ...bullets(report.records),
  ];
  return parts.join("");
}

export function renderConsoleSummary(report: SysmonReport, limits: ConsoleLimits): string[] {
  const interesting = report.suspicious.slice(0, limits.suspiciousEvents);
  const interestingTable = tableLines(renderTable(SUSPICIOUS_COLUMNS, interesting));

  return [
    "",
    "Top Sysmon event types:",
    ...tableLines(renderTable(COUNT_COLUMNS, report.counts.slice(0, limits.topEventTypes))),
    "",
    "Sample human-readable events:",
    ...report.records.slice(0, limits.sampleEvents).map((record) => `- ${toSentence(record)}`),
    "",
    "Interesting events (potentially higher priority):",
    ...(interestingTable.length > 0 ? interestingTable : ["No matching events."]),
    "",
    "Interesting events as sentences:",
    ...interesting.map((record) => `- ${toSentence(record)}`),
  ];
}

function bullets(records: readonly EventRecord[]): string[] {
  return records.map((record) => `- ${toSentence(record)}\n`);
}

function tableLines(text: string): string[] {
  return text === "" ? [] : text.split("\n");
}
