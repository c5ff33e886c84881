import { loadSysmonEvents } from "./events/loader.js";
import { buildSysmonReport, renderConsoleSummary, renderReportText } from "./report/compose.js";
import { createTextReportSink, type ReportSink } from "./sinks/index.js";
import type { RuntimeConfig, SysmonReport } from "./types.js";

/** Loads the input log, prints the console summary and persists the full report. */
export async function generateReport(
  config: RuntimeConfig,
  sink: ReportSink = createTextReportSink(config.reportFile),
): Promise<SysmonReport> {
  const events = await loadSysmonEvents(config.inputFile);
  const report = buildSysmonReport(config.inputFile, events);

  for (const line of renderConsoleSummary(report, config.console)) {
    console.log(line);
  }

  await sink.write(renderReportText(report));
  console.log(`\nReport saved to ${sink.location}`);

  return report;
}
