// === Session JSON Reporter ===
// Writes a SessionReport as a structured JSON file.

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { SessionReport } from "@adaptest/lib/types";

export class JsonReporter {
  async generate(report: SessionReport, outputDir: string): Promise<string> {
    const path = join(outputDir, `session_${report.sessionId}.json`);
    await mkdir(outputDir, { recursive: true });
    await writeFile(path, JSON.stringify(report, null, 2), "utf8");
    return path;
  }
}
