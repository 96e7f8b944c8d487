import fs from "fs";
import path from "path";
import { RunSummary } from "../pipeline/pipeline.types";

export function writeJsonReport(filePath: string, data: unknown) {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2), "utf8");
}

export function defaultReportPath(dir: string, summary: RunSummary): string {
  const kind = summary.dryRun ? "dryrun" : summary.mode;
  return path.join(dir, `run-${kind}-${summary.executionId}.json`);
}
