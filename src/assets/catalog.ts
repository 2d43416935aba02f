import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { z } from "zod";

import type { EffectiveConfig } from "../config/env.js";
import { ProvisionError, formatError } from "../errors.js";
import type { AssetDescriptor, GitCredential, VersionControlAsset } from "./types.js";

export const NO_MODEL = "none";

const sha256Schema = z
  .string()
  .regex(/^[0-9a-fA-F]{64}$/, "must be a 64-character hex digest")
  .optional();

const sourceSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("http"),
    provider: z.enum(["huggingface", "civitai", "generic"]).default("generic"),
    url: z.string().url()
  }),
  z.object({
    kind: z.literal("objectStore"),
    bucket: z.string().min(1).optional(),
    key: z.string().min(1)
  }),
  z.object({
    kind: z.literal("versionControl"),
    repositoryUrl: z.string().url(),
    branch: z.string().min(1).optional()
  })
]);

const entrySchema = z.object({
  id: z.string().min(1),
  group: z.enum(["app", "custom_node", "model"]),
  type: z.string().min(1),
  filename: z.string().min(1),
  optional: z.boolean().default(false),
  always: z.boolean().default(false),
  requires: z.array(z.string().min(1)).default([]),
  sha256: sha256Schema,
  source: sourceSchema
});

export const catalogSchema = z.object({
  assets: z.array(entrySchema)
});

export type CatalogEntry = z.infer<typeof entrySchema>;
export type AssetCatalog = z.infer<typeof catalogSchema>;

// Source runs load from src/assets, builds from dist/src/assets.
const BUNDLED_CATALOG_CANDIDATES = ["../../catalog/assets.json", "../../../catalog/assets.json"].map((relative) =>
  fileURLToPath(new URL(relative, import.meta.url))
);

export function bundledCatalogPath(): string {
  const found = BUNDLED_CATALOG_CANDIDATES.find((candidate) => existsSync(candidate));
  return found ?? BUNDLED_CATALOG_CANDIDATES[0];
}

export function parseCatalog(contents: string, source: string): AssetCatalog {
  let json: unknown;
  try {
    json = JSON.parse(contents);
  } catch (error) {
    throw new ProvisionError(`Asset catalog ${source} is not valid JSON: ${formatError(error)}`, "config");
  }

  const parsed = catalogSchema.safeParse(json);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ProvisionError(`Asset catalog ${source} is invalid: ${details}`, "config");
  }

  const seen = new Set<string>();
  for (const entry of parsed.data.assets) {
    if (seen.has(entry.id)) {
      throw new ProvisionError(`Asset catalog ${source} lists ${entry.id} more than once`, "config");
    }
    seen.add(entry.id);
  }
  return parsed.data;
}

export async function loadCatalog(catalogPath: string = bundledCatalogPath()): Promise<AssetCatalog> {
  let contents: string;
  try {
    contents = await readFile(catalogPath, "utf8");
  } catch (error) {
    throw new ProvisionError(`Failed to read asset catalog ${catalogPath}: ${formatError(error)}`, "config", {
      cause: error
    });
  }
  return parseCatalog(contents, catalogPath);
}

/**
 * Entries to provision, in catalog order: everything marked `always`, then
 * the model selection (all models, a model type, and/or a single model),
 * closed over `requires`.
 */
export function selectCatalogEntries(catalog: AssetCatalog, config: EffectiveConfig): CatalogEntry[] {
  const byKey = new Map<string, CatalogEntry>();
  for (const entry of catalog.assets) {
    byKey.set(entry.id, entry);
    if (!byKey.has(entry.filename)) {
      byKey.set(entry.filename, entry);
    }
  }

  const chosen = new Set<string>();
  for (const entry of catalog.assets) {
    if (entry.always) {
      chosen.add(entry.id);
    }
  }

  const models = catalog.assets.filter((entry) => entry.group === "model");
  if (config.AUTO_DOWNLOAD_ALL) {
    for (const entry of models) {
      chosen.add(entry.id);
    }
  } else {
    const type = config.AUTO_DOWNLOAD_TYPE;
    if (type) {
      const matches = catalog.assets.filter((entry) => entry.type === type && entry.group !== "app");
      if (matches.length === 0) {
        throw new ProvisionError(`Unknown asset type: ${type}`, "config");
      }
      for (const entry of matches) {
        chosen.add(entry.id);
      }
    }

    const model = config.AUTO_DOWNLOAD_MODEL;
    if (model !== NO_MODEL) {
      const entry = byKey.get(model);
      if (!entry || entry.group !== "model") {
        throw new ProvisionError(`Unknown model: ${model}`, "config");
      }
      chosen.add(entry.id);
    }
  }

  const pending = [...chosen];
  while (pending.length > 0) {
    const id = pending.pop();
    const entry = id === undefined ? undefined : byKey.get(id);
    for (const dependency of entry?.requires ?? []) {
      const required = byKey.get(dependency);
      if (!required) {
        throw new ProvisionError(`Asset ${id} requires unknown asset ${dependency}`, "config");
      }
      if (!chosen.has(required.id)) {
        chosen.add(required.id);
        pending.push(required.id);
      }
    }
  }

  return catalog.assets.filter((entry) => chosen.has(entry.id));
}

export function destinationFor(group: CatalogEntry["group"], type: string, config: EffectiveConfig): string {
  switch (group) {
    case "app":
      return path.dirname(config.COMFYUI_DIR);
    case "custom_node":
      return path.join(config.COMFYUI_DIR, "custom_nodes");
    case "model":
      return path.join(config.COMFYUI_DIR, "models", type);
  }
}

export function gitCredentialFor(repositoryUrl: string, config: EffectiveConfig): GitCredential | undefined {
  if (!config.GITHUB_USERNAME || !config.GITHUB_TOKEN) {
    return undefined;
  }
  let host: string;
  try {
    host = new URL(repositoryUrl).hostname;
  } catch {
    return undefined;
  }
  return host === "github.com" ? { username: config.GITHUB_USERNAME, token: config.GITHUB_TOKEN } : undefined;
}

export function toDescriptor(entry: CatalogEntry, config: EffectiveConfig): AssetDescriptor {
  const base = {
    id: entry.id,
    destinationPath: destinationFor(entry.group, entry.type, config),
    expectedFilename: entry.filename,
    optional: entry.optional
  };
  const source = entry.source;

  switch (source.kind) {
    case "http": {
      const token =
        source.provider === "huggingface"
          ? config.HF_TOKEN
          : source.provider === "civitai"
            ? config.CIVITAI_TOKEN
            : undefined;
      return {
        ...base,
        sourceKind: "http",
        provider: source.provider,
        url: source.url.replaceAll("{HF_REPO}", config.HF_REPO),
        credential: token,
        sha256: entry.sha256
      };
    }
    case "objectStore": {
      const bucket = source.bucket ?? config.R2_BUCKET;
      if (!bucket) {
        throw new ProvisionError(`Asset ${entry.id} needs a bucket (set R2_BUCKET or "bucket" in the catalog)`, "config");
      }
      return { ...base, sourceKind: "objectStore", bucket, key: source.key, sha256: entry.sha256 };
    }
    case "versionControl":
      return {
        ...base,
        sourceKind: "versionControl",
        repositoryUrl: source.repositoryUrl,
        branch: source.branch,
        credential: gitCredentialFor(source.repositoryUrl, config)
      };
  }
}

/** The application checkout itself; always provisioned first and required. */
export function applicationAsset(config: EffectiveConfig): VersionControlAsset {
  return {
    id: "comfyui",
    sourceKind: "versionControl",
    destinationPath: path.dirname(config.COMFYUI_DIR),
    expectedFilename: path.basename(config.COMFYUI_DIR),
    optional: false,
    repositoryUrl: config.COMFYUI_REPO_URL,
    branch: config.COMFYUI_BRANCH,
    credential: gitCredentialFor(config.COMFYUI_REPO_URL, config)
  };
}

export function selectAssets(catalog: AssetCatalog, config: EffectiveConfig): AssetDescriptor[] {
  return selectCatalogEntries(catalog, config).map((entry) => toDescriptor(entry, config));
}
