import { constants } from "node:fs";
import { access, mkdir, stat, statfs } from "node:fs/promises";
import net from "node:net";
import path from "node:path";

import { ProvisionError, formatError, isPermissionError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { EffectiveConfig } from "./env.js";

export async function ensureWorkDir(dir: string, logger: Logger, options: { dryRun: boolean }): Promise<void> {
  if (options.dryRun) {
    const ancestor = await nearestExistingAncestor(dir);
    const target = path.resolve(dir);
    const info = await stat(ancestor);
    if (!info.isDirectory()) {
      throw new ProvisionError(
        ancestor === target
          ? `Working directory ${dir} is not a directory`
          : `Working directory ${dir} cannot be created (${ancestor} is not a directory)`,
        "config"
      );
    }
    try {
      await access(ancestor, constants.W_OK);
    } catch (error) {
      throw new ProvisionError(`Working directory ${dir} cannot be created (${ancestor} is not writable)`, "permission", {
        cause: error
      });
    }
    if (ancestor !== target) {
      logger.dryRun(`would create working directory ${dir}`);
    }
    return;
  }

  try {
    await mkdir(dir, { recursive: true });
  } catch (error) {
    throw new ProvisionError(
      `Working directory ${dir} cannot be created: ${formatError(error)}`,
      isPermissionError(error) ? "permission" : "config",
      { cause: error }
    );
  }

  const info = await stat(dir);
  if (!info.isDirectory()) {
    throw new ProvisionError(`Working directory ${dir} is not a directory`, "config");
  }
}

export function isPortAvailable(port: number, host = "0.0.0.0"): Promise<boolean> {
  return new Promise((resolve, reject) => {
    const server = net.createServer();

    server.once("error", (error: NodeJS.ErrnoException) => {
      if (error.code === "EADDRINUSE" || error.code === "EACCES") {
        resolve(false);
        return;
      }
      reject(error);
    });

    server.once("listening", () => {
      server.close((closeError) => {
        if (closeError) {
          reject(closeError);
          return;
        }
        resolve(true);
      });
    });

    server.listen(port, host);
  });
}

/**
 * Advisory only: a bound port is reported as a warning and provisioning
 * continues.
 */
export async function checkPorts(
  config: EffectiveConfig,
  logger: Logger,
  probe: (port: number, host: string) => Promise<boolean> = isPortAvailable
): Promise<string[]> {
  const warnings: string[] = [];
  const targets = [
    { name: "FASTAPI_PORT", host: config.FASTAPI_HOST, port: config.FASTAPI_PORT },
    { name: "COMFYUI_PORT", host: config.COMFYUI_HOST, port: config.COMFYUI_PORT }
  ];

  for (const target of targets) {
    let available: boolean;
    try {
      available = await probe(target.port, target.host);
    } catch (error) {
      const message = `could not check ${target.name} ${target.port}: ${formatError(error)}`;
      logger.warn(message);
      warnings.push(message);
      continue;
    }
    if (!available) {
      const message = `port ${target.port} (${target.name}) is already in use`;
      logger.warn(message);
      warnings.push(message);
    }
  }
  return warnings;
}

export type FreeSpaceProbe = (dir: string) => Promise<number>;

const BYTES_PER_GB = 1024 ** 3;

/** Free bytes available to this user on the filesystem holding `dir` (or its nearest existing ancestor). */
export const statfsFreeBytes: FreeSpaceProbe = async (dir) => {
  const info = await statfs(await nearestExistingAncestor(dir));
  return info.bavail * info.bsize;
};

/**
 * Advisory, like the port check: too little space is a warning. A minimum of
 * 0 disables the check.
 */
export async function checkDiskSpace(
  dir: string,
  minimumGB: number,
  logger: Logger,
  probe: FreeSpaceProbe = statfsFreeBytes
): Promise<string[]> {
  if (minimumGB <= 0) {
    return [];
  }

  let freeBytes: number;
  try {
    freeBytes = await probe(dir);
  } catch (error) {
    const message = `could not check free space at ${dir}: ${formatError(error)}`;
    logger.warn(message);
    return [message];
  }

  const freeGB = (freeBytes / BYTES_PER_GB).toFixed(1);
  if (freeBytes < minimumGB * BYTES_PER_GB) {
    const message = `only ${freeGB} GB free at ${dir}; ${minimumGB} GB recommended`;
    logger.warn(message);
    return [message];
  }
  logger.info(`${freeGB} GB free at ${dir}`);
  return [];
}

/** Any HTTP response counts as reachable; only a network failure or timeout does not. */
export async function checkConnectivity(url: string, timeoutMs: number): Promise<boolean> {
  try {
    await fetch(url, { method: "HEAD", redirect: "follow", signal: AbortSignal.timeout(timeoutMs) });
    return true;
  } catch {
    return false;
  }
}
