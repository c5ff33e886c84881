import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { IOWriteError, errorMessage } from "../errors.js";
import type { ReportSink } from "./types.js";

export function createTextReportSink(reportPath: string): ReportSink {
  return {
    location: reportPath,
    write: async (text: string) => {
      try {
        await mkdir(path.dirname(reportPath), { recursive: true });
        await writeFile(reportPath, text, "utf8");
      } catch (error: unknown) {
        throw new IOWriteError(`Failed to write report ${reportPath}: ${errorMessage(error)}`, { cause: error });
      }
    },
  };
}
