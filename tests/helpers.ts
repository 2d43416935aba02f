import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type { Logger } from "../src/logging/logger.js";

export interface RecordingLogger extends Logger {
  lines: string[];
}

export function createRecordingLogger(): RecordingLogger {
  const lines: string[] = [];
  const record = (level: string) => (message: string) => {
    lines.push(`${level}: ${message}`);
  };
  return {
    lines,
    step: record("step"),
    info: record("info"),
    success: record("success"),
    warn: record("warn"),
    error: record("error"),
    dryRun: record("dry-run")
  };
}

export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "provisioner-test-"));
  return {
    dir,
    cleanup: () => rm(dir, { recursive: true, force: true })
  };
}
