import type { Stats } from "node:fs";
import { lstat, mkdir, readlink, rename, stat, symlink, unlink } from "node:fs/promises";
import path from "node:path";

import { ProvisionError, formatError, getErrorCode, isPermissionError } from "../errors.js";
import type { Logger } from "../logging/logger.js";

export const MODEL_TYPES = [
  "checkpoints",
  "vae",
  "clip",
  "controlnet",
  "loras",
  "unet",
  "diffusion_models",
  "embeddings",
  "hypernetworks",
  "upscale_models"
] as const;

export type ModelType = (typeof MODEL_TYPES)[number];

const LOCAL_ONLY_SUBPATHS = ["models/style_models", "custom_nodes", "input", "output", "temp"];

export interface BindingSpec {
  canonicalSubpath: string;
  /** Path below the external mount root; absent for directories that always stay local. */
  externalSubpath?: string;
}

export interface DirectoryBinding {
  canonicalSubpath: string;
  canonicalPath: string;
  externalMountCandidate: string | null;
  localFallbackPath: string;
  mode: "symlink" | "local";
  backupPath?: string;
}

export interface BindOptions {
  dryRun: boolean;
  logger: Logger;
  now?: () => Date;
}

export function defaultBindingSpecs(): BindingSpec[] {
  return [
    ...MODEL_TYPES.map((type) => ({ canonicalSubpath: `models/${type}`, externalSubpath: type })),
    ...LOCAL_ONLY_SUBPATHS.map((subpath) => ({ canonicalSubpath: subpath }))
  ];
}

/**
 * Makes every canonical subpath either a symlink into the external mount (when
 * the mount provides that subpath) or a plain local directory. Existing real
 * directories are renamed to a timestamped backup before being replaced.
 */
export async function bindDirectories(
  canonicalRoot: string,
  externalMountRoot: string | null | undefined,
  subpaths: BindingSpec[],
  options: BindOptions
): Promise<DirectoryBinding[]> {
  const bindings: DirectoryBinding[] = [];

  for (const spec of subpaths) {
    const canonicalPath = path.join(canonicalRoot, spec.canonicalSubpath);
    const candidate =
      externalMountRoot && spec.externalSubpath !== undefined
        ? path.join(externalMountRoot, spec.externalSubpath)
        : null;

    try {
      const mountAvailable = candidate !== null && (await isDirectory(candidate));
      if (candidate !== null && mountAvailable) {
        bindings.push(await bindToMount(spec.canonicalSubpath, canonicalPath, candidate, options));
      } else {
        bindings.push(await ensureLocalDirectory(spec.canonicalSubpath, canonicalPath, candidate, options));
      }
    } catch (error) {
      if (error instanceof ProvisionError) {
        throw error;
      }
      if (isPermissionError(error)) {
        throw new ProvisionError(`Permission denied while binding ${canonicalPath}: ${formatError(error)}`, "permission", {
          cause: error
        });
      }
      throw new ProvisionError(`Failed to bind ${canonicalPath}: ${formatError(error)}`, "runtime", { cause: error });
    }
  }

  return bindings;
}

async function bindToMount(
  canonicalSubpath: string,
  canonicalPath: string,
  mountPath: string,
  options: BindOptions
): Promise<DirectoryBinding> {
  const { dryRun, logger } = options;
  const binding: DirectoryBinding = {
    canonicalSubpath,
    canonicalPath,
    externalMountCandidate: mountPath,
    localFallbackPath: canonicalPath,
    mode: "symlink"
  };

  const existing = await lstatOrNull(canonicalPath);
  if (existing?.isSymbolicLink()) {
    if ((await readlink(canonicalPath)) === mountPath) {
      logger.info(`already linked: ${canonicalPath} -> ${mountPath}`);
      return binding;
    }
    if (dryRun) {
      logger.dryRun(`would replace symlink ${canonicalPath}`);
    } else {
      await unlink(canonicalPath);
    }
  } else if (existing) {
    const backupPath = await nextBackupPath(canonicalPath, options.now?.() ?? new Date());
    binding.backupPath = backupPath;
    if (dryRun) {
      logger.dryRun(`would back up ${canonicalPath} to ${backupPath}`);
    } else {
      logger.info(`backing up existing directory ${canonicalPath} -> ${backupPath}`);
      await rename(canonicalPath, backupPath);
    }
  }

  if (dryRun) {
    logger.dryRun(`would link ${canonicalPath} -> ${mountPath}`);
    return binding;
  }

  await mkdir(path.dirname(canonicalPath), { recursive: true });
  await symlink(mountPath, canonicalPath, "dir");
  logger.success(`linked ${canonicalPath} -> ${mountPath}`);
  return binding;
}

async function ensureLocalDirectory(
  canonicalSubpath: string,
  canonicalPath: string,
  candidate: string | null,
  options: BindOptions
): Promise<DirectoryBinding> {
  const { dryRun, logger } = options;
  const binding: DirectoryBinding = {
    canonicalSubpath,
    canonicalPath,
    externalMountCandidate: candidate,
    localFallbackPath: canonicalPath,
    mode: "local"
  };

  const existing = await lstatOrNull(canonicalPath);
  if (existing?.isSymbolicLink()) {
    // A link left behind by an earlier run whose mount is gone.
    if (dryRun) {
      logger.dryRun(`would replace stale symlink ${canonicalPath} with a local directory`);
      return binding;
    }
    await unlink(canonicalPath);
  } else if (existing) {
    if (!existing.isDirectory()) {
      throw new ProvisionError(`${canonicalPath} exists and is not a directory`, "runtime");
    }
    return binding;
  }

  if (dryRun) {
    logger.dryRun(`would create local directory ${canonicalPath}`);
    return binding;
  }
  await mkdir(canonicalPath, { recursive: true });
  logger.info(`created local directory ${canonicalPath}`);
  return binding;
}

export function formatBackupTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

async function nextBackupPath(canonicalPath: string, now: Date): Promise<string> {
  const base = `${canonicalPath}.backup.${formatBackupTimestamp(now)}`;
  let candidate = base;
  let counter = 1;
  while (await lstatOrNull(candidate)) {
    candidate = `${base}.${counter}`;
    counter += 1;
  }
  return candidate;
}

async function lstatOrNull(target: string): Promise<Stats | null> {
  try {
    return await lstat(target);
  } catch (error) {
    if (getErrorCode(error) === "ENOENT") {
      return null;
    }
    throw error;
  }
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isDirectory();
  } catch (error) {
    if (getErrorCode(error) === "ENOENT" || getErrorCode(error) === "ENOTDIR") {
      return false;
    }
    throw error;
  }
}
