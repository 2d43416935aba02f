import { access, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import dotenv from "dotenv";
import { expand } from "dotenv-expand";

import { ProvisionError, formatError, getErrorCode } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { type EffectiveConfig, pickSettings, type RawSettings } from "./env.js";

export const CONFIG_FILE_NAME = ".env";
export const TEMPLATE_FILE_NAME = ".env.template";

export interface ConfigSearchInput {
  workDir: string;
  homeDir?: string;
  cwd: string;
  explicitPath?: string;
}

export function configFileCandidates(input: ConfigSearchInput): string[] {
  const candidates = [
    input.explicitPath,
    path.join(input.workDir, CONFIG_FILE_NAME),
    input.homeDir ? path.join(input.homeDir, CONFIG_FILE_NAME) : undefined,
    path.join(input.cwd, CONFIG_FILE_NAME)
  ].filter((candidate): candidate is string => Boolean(candidate));
  return [...new Set(candidates.map((candidate) => path.resolve(candidate)))];
}

export async function findConfigFile(input: ConfigSearchInput): Promise<string | null> {
  if (input.explicitPath && !(await pathExists(input.explicitPath))) {
    throw new ProvisionError(`Configuration file not found: ${input.explicitPath}`, "config");
  }
  for (const candidate of configFileCandidates(input)) {
    if (await pathExists(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Parses KEY=value lines and expands ${VAR} references against earlier keys of
 * the same file and the given environment. Values already set in the
 * environment do not leak into the file layer.
 */
export function parseConfigFile(contents: string, env: Record<string, string | undefined>): RawSettings {
  const parsed = dotenv.parse(contents);
  const lookup: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined && !(name in parsed)) {
      lookup[name] = value;
    }
  }
  const expanded = expand({ parsed, processEnv: lookup });
  if (expanded.error) {
    throw new ProvisionError(`Failed to expand configuration file: ${expanded.error.message}`, "config");
  }
  return pickSettings(expanded.parsed ?? parsed);
}

export async function readConfigFile(
  filePath: string,
  env: Record<string, string | undefined>
): Promise<RawSettings> {
  let contents: string;
  try {
    contents = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ProvisionError(`Failed to read configuration file ${filePath}: ${formatError(error)}`, "config", {
      cause: error
    });
  }
  return parseConfigFile(contents, env);
}

export function renderConfigTemplate(config: EffectiveConfig): string {
  return [
    "# diffusion-provisioner configuration",
    "# Copy to .env and fill in the placeholders.",
    "",
    "# Paths",
    `WORK_DIR=${config.WORK_DIR}`,
    `COMFYUI_DIR=${config.COMFYUI_DIR}`,
    `PYTHON_VERSION=${config.PYTHON_VERSION}`,
    `EXTERNAL_MODELS_DIR=${config.EXTERNAL_MODELS_DIR}`,
    "",
    "# Services",
    `FASTAPI_HOST=${config.FASTAPI_HOST}`,
    `FASTAPI_PORT=${config.FASTAPI_PORT}`,
    `COMFYUI_HOST=${config.COMFYUI_HOST}`,
    `COMFYUI_PORT=${config.COMFYUI_PORT}`,
    "",
    "# Hugging Face",
    "HF_TOKEN=hf_your_token_here",
    `HF_REPO=${config.HF_REPO}`,
    "",
    "# Civitai",
    "CIVITAI_TOKEN=your_civitai_token_here",
    "",
    "# S3-compatible object store (Cloudflare R2)",
    "R2_ACCESS_KEY_ID=your_access_key_here",
    "R2_SECRET_ACCESS_KEY=your_secret_key_here",
    "R2_ENDPOINT=https://your-account-id.r2.cloudflarestorage.com",
    "R2_BUCKET=your_bucket_here",
    "",
    "# Ngrok",
    "NGROK_TOKEN=your_ngrok_token_here",
    "NGROK_DOMAIN=your_domain_here",
    "",
    "# GitHub",
    "GITHUB_USERNAME=your_username_here",
    "GITHUB_TOKEN=your_personal_access_token_here",
    "",
    "# Automation",
    "AUTO_INSTALL=false",
    "SKIP_DEPS=false",
    "DRY_RUN=false",
    "",
    "# Model selection",
    `AUTO_DOWNLOAD_MODEL=${config.AUTO_DOWNLOAD_MODEL}`,
    "AUTO_DOWNLOAD_TYPE=",
    "AUTO_DOWNLOAD_ALL=false",
    ""
  ].join("\n");
}

export type TemplateOutcome = "written" | "exists" | "planned";

/**
 * Writes WORK_DIR/.env.template for first-run setup. Without `force` an
 * existing .env or .env.template is left alone; .env is never written.
 */
export async function ensureConfigTemplate(
  config: EffectiveConfig,
  logger: Logger,
  options: { dryRun: boolean; force?: boolean }
): Promise<{ outcome: TemplateOutcome; path: string }> {
  const templatePath = path.join(config.WORK_DIR, TEMPLATE_FILE_NAME);
  const configPath = path.join(config.WORK_DIR, CONFIG_FILE_NAME);
  const force = options.force ?? false;

  if (!force && ((await pathExists(configPath)) || (await pathExists(templatePath)))) {
    return { outcome: "exists", path: templatePath };
  }

  if (options.dryRun) {
    logger.dryRun(`would write configuration template ${templatePath}`);
    return { outcome: "planned", path: templatePath };
  }

  try {
    await writeFile(templatePath, renderConfigTemplate(config), { encoding: "utf8", flag: force ? "w" : "wx" });
  } catch (error) {
    if (getErrorCode(error) === "EEXIST") {
      return { outcome: "exists", path: templatePath };
    }
    throw error;
  }
  logger.info(`wrote configuration template ${templatePath}; edit it and rename to ${CONFIG_FILE_NAME}`);
  return { outcome: "written", path: templatePath };
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}
