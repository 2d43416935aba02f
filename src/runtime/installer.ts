import path from "node:path";

import { execa } from "execa";

import type { EffectiveConfig } from "../config/env.js";
import { pathExists } from "../config/configFile.js";
import { ProvisionError, formatError } from "../errors.js";
import type { HostCapabilities } from "../host/capabilities.js";
import { selectTorchIndex } from "../host/runtimeFlags.js";
import type { Logger } from "../logging/logger.js";

export interface InstallCommand {
  file: string;
  args: string[];
}

export type CommandExecutor = (command: InstallCommand) => Promise<void>;

export type InstallOutcome = "skipped" | "planned" | "installed";

export const inheritExecutor: CommandExecutor = async (command) => {
  await execa(command.file, command.args, { stdio: "inherit" });
};

export function venvDir(config: EffectiveConfig): string {
  return path.join(config.WORK_DIR, "venv");
}

export async function planRuntimeInstall(
  config: EffectiveConfig,
  capabilities: HostCapabilities,
  exists: (filePath: string) => Promise<boolean> = pathExists
): Promise<InstallCommand[]> {
  const venv = venvDir(config);
  const pip = path.join(venv, "bin", "pip");
  const requirements = path.join(config.COMFYUI_DIR, "requirements.txt");
  const commands: InstallCommand[] = [];

  if (!(await exists(path.join(venv, "bin", "python")))) {
    commands.push({ file: `python${config.PYTHON_VERSION}`, args: ["-m", "venv", venv] });
  }
  commands.push({ file: pip, args: ["install", "--upgrade", "pip"] });
  commands.push({
    file: pip,
    args: ["install", "torch", "torchvision", "torchaudio", "--index-url", selectTorchIndex(capabilities).url]
  });
  if (await exists(requirements)) {
    commands.push({ file: pip, args: ["install", "-r", requirements] });
  }
  return commands;
}

export async function installRuntime(
  config: EffectiveConfig,
  capabilities: HostCapabilities,
  logger: Logger,
  execute: CommandExecutor = inheritExecutor
): Promise<InstallOutcome> {
  if (config.SKIP_DEPS) {
    logger.info("skipping runtime dependencies (SKIP_DEPS)");
    return "skipped";
  }

  const commands = await planRuntimeInstall(config, capabilities);
  if (config.DRY_RUN) {
    for (const command of commands) {
      logger.dryRun(`would run: ${[command.file, ...command.args].join(" ")}`);
    }
    return "planned";
  }

  for (const command of commands) {
    logger.info(`running ${[command.file, ...command.args].join(" ")}`);
    try {
      await execute(command);
    } catch (error) {
      throw new ProvisionError(`Runtime install step failed (${command.file}): ${formatError(error)}`, "runtime", {
        cause: error
      });
    }
  }
  logger.success(`runtime installed into ${venvDir(config)}`);
  return "installed";
}
