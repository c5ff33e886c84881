import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { NotFoundError } from "../errors.js";
import { generateReport } from "../pipeline.js";
import type { ReportSink } from "../sinks/index.js";
import type { RuntimeConfig } from "../types.js";
import { eventXml, eventsDocument } from "./fixtures.js";

const ROUND_TRIP_SENTENCE =
  "At 2024-01-01T00:00:00Z, on computer HOST1, Process created (a program started): " +
  "C:\\Windows\\System32\\cmd.exe (process ID 1234).";

describe("generateReport", () => {
  let tempDir: string;
  let config: RuntimeConfig;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "sysmon-pipeline-"));
    config = {
      inputFile: path.join(tempDir, "sysmon_events.xml"),
      reportFile: path.join(tempDir, "output", "sysmon_report.txt"),
      console: { topEventTypes: 10, sampleEvents: 5, suspiciousEvents: 20 },
    };
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  it("turns a single process event into a flagged sentence", async () => {
    await writeFile(
      config.inputFile,
      eventsDocument([
        eventXml({
          eventId: "1",
          computer: "HOST1",
          data: {
            UtcTime: "2024-01-01T00:00:00Z",
            Image: "C:\\Windows\\System32\\cmd.exe",
            ProcessId: "1234",
          },
        }),
      ]),
      "utf8",
    );

    const report = await generateReport(config);
    const text = await readFile(config.reportFile, "utf8");

    expect(report.suspicious).toEqual(report.records);
    expect(text.endsWith(`All events (full log in sentences):\n- ${ROUND_TRIP_SENTENCE}\n`)).toBe(true);
    expect(text).toContain(`Interesting / potentially suspicious events:\n- ${ROUND_TRIP_SENTENCE}\n`);
    expect(console.log).toHaveBeenCalledWith(`Loaded 1 events from ${config.inputFile}`);
    expect(console.log).toHaveBeenCalledWith(`- ${ROUND_TRIP_SENTENCE}`);
    expect(console.log).toHaveBeenLastCalledWith(`\nReport saved to ${config.reportFile}`);
  });

  it("writes only headings for a log without events", async () => {
    await writeFile(config.inputFile, eventsDocument([]), "utf8");

    const report = await generateReport(config);

    expect(report.records).toEqual([]);
    expect(await readFile(config.reportFile, "utf8")).toBe(
      "Sysmon Human-Readable Report\n" +
        "========================================\n\n" +
        "Top event types:\n\n\n" +
        "Interesting / potentially suspicious events:\n\n" +
        "All events (full log in sentences):\n",
    );
  });

  it("hands the report text to the given sink", async () => {
    await writeFile(config.inputFile, eventsDocument([eventXml({ eventId: "999" })]), "utf8");
    const written: string[] = [];
    const sink: ReportSink = {
      location: "memory",
      write: async (text) => {
        written.push(text);
      },
    };

    const report = await generateReport(config, sink);

    expect(report.counts).toEqual([{ event_id: "999", description: "Other Sysmon event", count: 1 }]);
    expect(written).toHaveLength(1);
    expect(written[0]).toContain("- At None, on computer None, Other Sysmon event: None (process ID None).\n");
    expect(console.log).toHaveBeenLastCalledWith("\nReport saved to memory");
  });

  it("stops before writing when the input is missing", async () => {
    await expect(generateReport(config)).rejects.toBeInstanceOf(NotFoundError);
    await expect(readFile(config.reportFile, "utf8")).rejects.toThrow();
  });
});
