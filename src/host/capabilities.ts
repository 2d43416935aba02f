import { execa } from "execa";

import { formatError } from "../errors.js";
import { type Logger, silentLogger } from "../logging/logger.js";

export interface HostCapabilities {
  acceleratorPresent: boolean;
  acceleratorCount: number;
  acceleratorName?: string;
  /** Memory of the first accelerator, in MiB as nvidia-smi reports it. */
  acceleratorMemoryMB?: number;
  driverVersion?: string;
  toolkitVersion?: string;
}

export type CommandRunner = (file: string, args: string[]) => Promise<string>;

export const execaRunner: CommandRunner = async (file, args) => {
  const result = await execa(file, args);
  return result.stdout;
};

export interface GpuInfo {
  count: number;
  name: string;
  memoryMB: number;
  driverVersion?: string;
}

export function parseNvidiaSmi(stdout: string): GpuInfo | null {
  const lines = stdout
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
  if (lines.length === 0) {
    return null;
  }

  const [name, memory, driverVersion] = lines[0].split(",").map((part) => part.trim());
  const memoryMB = Number.parseInt(memory ?? "", 10);
  if (!name || !Number.isFinite(memoryMB)) {
    return null;
  }
  return { count: lines.length, name, memoryMB, driverVersion: driverVersion || undefined };
}

export function parseNvccVersion(stdout: string): string | undefined {
  return /release (\d+\.\d+)/.exec(stdout)?.[1];
}

export async function detectHostCapabilities(
  run: CommandRunner = execaRunner,
  logger: Logger = silentLogger
): Promise<HostCapabilities> {
  let gpu: GpuInfo | null = null;
  try {
    gpu = parseNvidiaSmi(
      await run("nvidia-smi", ["--query-gpu=name,memory.total,driver_version", "--format=csv,noheader,nounits"])
    );
  } catch (error) {
    logger.info(`nvidia-smi unavailable: ${formatError(error)}`);
  }

  let toolkitVersion: string | undefined;
  try {
    toolkitVersion = parseNvccVersion(await run("nvcc", ["--version"]));
  } catch (error) {
    logger.info(`nvcc unavailable: ${formatError(error)}`);
  }

  if (!gpu) {
    return { acceleratorPresent: false, acceleratorCount: 0, toolkitVersion };
  }
  return {
    acceleratorPresent: true,
    acceleratorCount: gpu.count,
    acceleratorName: gpu.name,
    acceleratorMemoryMB: gpu.memoryMB,
    driverVersion: gpu.driverVersion,
    toolkitVersion
  };
}
