import { z } from "zod";

import { ProvisionError } from "../errors.js";

export const DEFAULT_WORK_DIR = "/my-hybrid-service";
export const DEFAULT_COMFYUI_DIR = "/workspace/ComfyUI";

const TRUE_VALUES = ["1", "true", "yes", "on"];

function booleanWithDefaultFromEnv(defaultValue: boolean) {
  return z.preprocess((value) => {
    if (value === undefined || value === null || value === "") {
      return defaultValue;
    }
    if (typeof value === "boolean") {
      return value;
    }
    if (typeof value === "string") {
      return TRUE_VALUES.includes(value.trim().toLowerCase());
    }
    return defaultValue;
  }, z.boolean());
}

const optionalStringFromEnv = z.preprocess((value) => {
  if (typeof value !== "string") {
    return value;
  }
  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}, z.string().optional());

const optionalUrlFromEnv = z.preprocess((value) => {
  if (typeof value !== "string") {
    return value;
  }
  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}, z.string().url().optional());

const portFromEnv = (defaultValue: number) => z.coerce.number().int().min(1).max(65535).default(defaultValue);

export const configSchema = z.object({
  WORK_DIR: z.string().min(1).default(DEFAULT_WORK_DIR),
  COMFYUI_DIR: z.string().min(1).default(DEFAULT_COMFYUI_DIR),
  COMFYUI_REPO_URL: z.string().url().default("https://github.com/comfyanonymous/ComfyUI.git"),
  COMFYUI_BRANCH: z.string().min(1).default("master"),
  PYTHON_VERSION: z.string().min(1).default("3.10"),
  FASTAPI_HOST: z.string().min(1).default("0.0.0.0"),
  FASTAPI_PORT: portFromEnv(8000),
  COMFYUI_HOST: z.string().min(1).default("0.0.0.0"),
  COMFYUI_PORT: portFromEnv(8188),
  COMFYUI_EXTRA_ARGS: z.string().default(""),
  EXTERNAL_MODELS_DIR: z.string().min(1).default("/models"),
  HF_REPO: z.string().min(1).default("black-forest-labs/FLUX.1-dev"),
  HF_TOKEN: optionalStringFromEnv,
  CIVITAI_TOKEN: optionalStringFromEnv,
  R2_ACCESS_KEY_ID: optionalStringFromEnv,
  R2_SECRET_ACCESS_KEY: optionalStringFromEnv,
  R2_ENDPOINT: optionalUrlFromEnv,
  R2_BUCKET: optionalStringFromEnv,
  R2_REGION: z.string().min(1).default("auto"),
  GITHUB_USERNAME: optionalStringFromEnv,
  GITHUB_TOKEN: optionalStringFromEnv,
  NGROK_TOKEN: optionalStringFromEnv,
  NGROK_DOMAIN: optionalStringFromEnv,
  AUTO_INSTALL: booleanWithDefaultFromEnv(false),
  SKIP_DEPS: booleanWithDefaultFromEnv(false),
  DRY_RUN: booleanWithDefaultFromEnv(false),
  AUTO_DOWNLOAD_MODEL: z.string().min(1).default("flux1-dev.safetensors"),
  AUTO_DOWNLOAD_TYPE: optionalStringFromEnv,
  AUTO_DOWNLOAD_ALL: booleanWithDefaultFromEnv(false),
  ASSET_CATALOG: optionalStringFromEnv,
  HEALTH_PATH: z.string().startsWith("/").default("/system_stats"),
  HEALTH_MAX_ATTEMPTS: z.coerce.number().int().positive().default(30),
  HEALTH_INTERVAL_SECONDS: z.coerce.number().min(0).default(10),
  HEALTH_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  DOWNLOAD_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),
  MIN_FREE_DISK_GB: z.coerce.number().min(0).default(20),
  CONNECTIVITY_URL: z.string().url().default("https://huggingface.co")
});

export type EffectiveConfig = Readonly<z.infer<typeof configSchema>>;
export type ConfigKey = keyof z.infer<typeof configSchema>;
export type RawSettings = Partial<Record<ConfigKey, string>>;

export function isConfigKey(name: string): name is ConfigKey {
  return Object.prototype.hasOwnProperty.call(configSchema.shape, name);
}

export const CONFIG_KEYS: readonly ConfigKey[] = Object.keys(configSchema.shape).filter(isConfigKey);

/**
 * Keeps only recognised configuration keys with a non-empty value. Everything
 * else in a source (PATH, HOME, unrelated file entries) is ignored.
 */
export function pickSettings(source: Record<string, string | undefined>): RawSettings {
  const picked: RawSettings = {};
  for (const [name, value] of Object.entries(source)) {
    if (!isConfigKey(name) || value === undefined || value.trim() === "") {
      continue;
    }
    picked[name] = value;
  }
  return picked;
}

export function parseConfig(raw: RawSettings): EffectiveConfig {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ProvisionError(`Invalid configuration: ${details}`, "config");
  }
  return Object.freeze(parsed.data);
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): EffectiveConfig {
  return parseConfig(pickSettings(source));
}
