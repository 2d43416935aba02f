import { chmod, writeFile } from "node:fs/promises";
import path from "node:path";

import type { EffectiveConfig } from "../config/env.js";
import type { Logger } from "../logging/logger.js";

export const STARTUP_SCRIPT_NAME = "start_comfyui.sh";

const SHELL_SAFE = /^[A-Za-z0-9_@%+=:,./-]+$/;

export function shellQuote(value: string): string {
  if (SHELL_SAFE.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function splitExtraArgs(extraArgs: string): string[] {
  return extraArgs.split(/\s+/).filter(Boolean);
}

export function startupScriptPath(config: EffectiveConfig): string {
  return path.join(config.WORK_DIR, STARTUP_SCRIPT_NAME);
}

/** Same inputs always give byte-identical output. */
export function renderStartupScript(
  config: EffectiveConfig,
  runtimeFlags: Record<string, string>,
  launchArgs: string[] = []
): string {
  const exports = Object.keys(runtimeFlags)
    .sort()
    .map((name) => `export ${name}=${shellQuote(runtimeFlags[name])}`);

  const command = [
    "exec python main.py",
    `--listen ${shellQuote(config.COMFYUI_HOST)}`,
    `--port ${config.COMFYUI_PORT}`,
    ...[...launchArgs, ...splitExtraArgs(config.COMFYUI_EXTRA_ARGS)].map(shellQuote)
  ].join(" ");

  return [
    "#!/bin/bash",
    "set -e",
    "",
    `cd ${shellQuote(config.COMFYUI_DIR)}`,
    `source ${shellQuote(path.join(config.WORK_DIR, "venv", "bin", "activate"))}`,
    "",
    `export PYTHONPATH=${shellQuote(config.COMFYUI_DIR)}`,
    ...exports,
    "",
    command,
    ""
  ].join("\n");
}

export interface GenerateScriptOptions {
  launchArgs?: string[];
  dryRun: boolean;
  logger: Logger;
}

export async function generateStartupScript(
  config: EffectiveConfig,
  runtimeFlags: Record<string, string>,
  options: GenerateScriptOptions
): Promise<string> {
  const scriptPath = startupScriptPath(config);
  const contents = renderStartupScript(config, runtimeFlags, options.launchArgs);

  if (options.dryRun) {
    options.logger.dryRun(`would write ${scriptPath}:\n${contents}`);
    return scriptPath;
  }

  await writeFile(scriptPath, contents, "utf8");
  // writeFile only applies the mode when it creates the file.
  await chmod(scriptPath, 0o755);
  options.logger.success(`startup script written to ${scriptPath}`);
  return scriptPath;
}
