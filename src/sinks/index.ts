export { createTextReportSink } from "./text.js";
export type { ReportSink } from "./types.js";
