import { stat } from "node:fs/promises";
import path from "node:path";

import type { EffectiveConfig } from "../config/env.js";
import { pathExists } from "../config/configFile.js";
import { ProvisionError, formatError, getErrorCode } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { TempFileRegistry } from "../runtime/cleanup.js";
import { buildAuthorizedRequest, redactUrl } from "./credentials.js";
import { verifyChecksum, writeStreamAtomically } from "./download.js";
import { CliGitClient, type GitClient } from "./gitClient.js";
import { type ObjectStoreClient, S3ObjectStoreClient, objectStoreSettingsFromConfig } from "./objectStore.js";
import type {
  AssetDescriptor,
  FetchResult,
  HttpAsset,
  ObjectStoreAsset,
  VersionControlAsset
} from "./types.js";

export interface AssetFetcherOptions {
  config: EffectiveConfig;
  logger: Logger;
  git?: GitClient;
  objectStore?: ObjectStoreClient | null;
  tempFiles?: TempFileRegistry;
}

export function targetPathOf(asset: AssetDescriptor): string {
  return path.join(asset.destinationPath, asset.expectedFilename);
}

export class AssetFetcher {
  private readonly config: EffectiveConfig;
  private readonly logger: Logger;
  private readonly git: GitClient;
  private readonly objectStore: ObjectStoreClient | null;
  private readonly tempFiles: TempFileRegistry;

  constructor(options: AssetFetcherOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.git = options.git ?? new CliGitClient(options.config.DOWNLOAD_TIMEOUT_MS);
    this.objectStore =
      options.objectStore === undefined ? createObjectStoreClient(options.config) : options.objectStore;
    this.tempFiles = options.tempFiles ?? new TempFileRegistry();
  }

  /** Never throws for source failures; they come back as a `failed` result. */
  async fetch(asset: AssetDescriptor): Promise<FetchResult> {
    if (asset.sourceKind === "versionControl") {
      return this.fetchRepository(asset);
    }

    const target = targetPathOf(asset);
    if (await hasContent(target)) {
      this.logger.info(`${asset.id}: already present at ${target}`);
      return { status: "skipped", asset, path: target, reason: "already present" };
    }

    if (this.config.DRY_RUN) {
      this.logger.dryRun(`would fetch ${describeSource(asset)} -> ${target}`);
      return { status: "skipped", asset, path: target, reason: "dry-run" };
    }

    this.logger.info(`fetching ${asset.id} from ${describeSource(asset)}`);
    try {
      if (asset.sourceKind === "http") {
        await this.downloadHttp(asset, target);
      } else {
        await this.downloadObject(asset, target);
      }
      if (asset.sha256) {
        await verifyChecksum(target, asset.sha256);
      }
    } catch (error) {
      return { status: "failed", asset, path: target, reason: formatError(error) };
    }

    this.logger.success(`${asset.id} saved to ${target}`);
    return { status: "downloaded", asset, path: target };
  }

  /**
   * Fetches in order. A failed optional asset is reported and skipped over; a
   * failed required asset stops the run.
   */
  async fetchAll(assets: AssetDescriptor[]): Promise<FetchResult[]> {
    const results: FetchResult[] = [];
    for (const asset of assets) {
      const result = await this.fetch(asset);
      results.push(result);
      if (result.status !== "failed") {
        continue;
      }
      if (asset.optional) {
        this.logger.warn(`optional asset ${asset.id} failed: ${result.reason ?? "unknown error"}`);
        continue;
      }
      throw new ProvisionError(`Required asset ${asset.id} failed: ${result.reason ?? "unknown error"}`, "asset");
    }
    return results;
  }

  private async downloadHttp(asset: HttpAsset, target: string): Promise<void> {
    const request = buildAuthorizedRequest(asset.provider, asset.url, asset.credential);
    const timeoutMs = this.config.DOWNLOAD_TIMEOUT_MS;
    const response = await fetch(request.url.toString(), {
      headers: request.headers,
      redirect: "follow",
      signal: timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined
    });
    if (!response.ok) {
      throw new Error(`GET ${redactUrl(request.url)} responded with ${response.status}`);
    }
    if (!response.body) {
      throw new Error(`GET ${redactUrl(request.url)} returned an empty body`);
    }
    await writeStreamAtomically(response.body, target, this.tempFiles);
  }

  private async downloadObject(asset: ObjectStoreAsset, target: string): Promise<void> {
    if (!this.objectStore) {
      throw new Error("object store is not configured (set R2_ENDPOINT, R2_ACCESS_KEY_ID and R2_SECRET_ACCESS_KEY)");
    }
    const body = await this.objectStore.getObject(asset.bucket, asset.key);
    await writeStreamAtomically(body, target, this.tempFiles);
  }

  private async fetchRepository(asset: VersionControlAsset): Promise<FetchResult> {
    const target = targetPathOf(asset);

    if (await pathExists(path.join(target, ".git"))) {
      if (this.config.DRY_RUN) {
        this.logger.dryRun(`would update ${asset.id} in ${target}`);
        return { status: "skipped", asset, path: target, reason: "dry-run" };
      }
      try {
        await this.git.pull(target, asset.credential);
      } catch (error) {
        const reason = `update failed, using existing checkout: ${formatError(error)}`;
        this.logger.warn(`${asset.id}: ${reason}`);
        return { status: "skipped", asset, path: target, reason, degraded: true };
      }
      this.logger.success(`${asset.id} updated in ${target}`);
      return { status: "downloaded", asset, path: target, reason: "updated" };
    }

    if (await pathExists(target)) {
      this.logger.info(`${asset.id}: ${target} exists and is not a git checkout; leaving it as is`);
      return { status: "skipped", asset, path: target, reason: "already present" };
    }

    if (this.config.DRY_RUN) {
      this.logger.dryRun(`would clone ${asset.repositoryUrl} -> ${target}`);
      return { status: "skipped", asset, path: target, reason: "dry-run" };
    }

    this.logger.info(`cloning ${asset.repositoryUrl}`);
    try {
      await this.git.clone({
        repositoryUrl: asset.repositoryUrl,
        destination: target,
        branch: asset.branch,
        credential: asset.credential
      });
    } catch (error) {
      return { status: "failed", asset, path: target, reason: formatError(error) };
    }
    this.logger.success(`${asset.id} cloned into ${target}`);
    return { status: "downloaded", asset, path: target };
  }
}

export function createObjectStoreClient(config: EffectiveConfig): ObjectStoreClient | null {
  const settings = objectStoreSettingsFromConfig(config);
  return settings ? new S3ObjectStoreClient(settings) : null;
}

function describeSource(asset: HttpAsset | ObjectStoreAsset): string {
  if (asset.sourceKind === "http") {
    let shown = asset.url;
    try {
      shown = redactUrl(new URL(asset.url));
    } catch {
      // Unparseable URLs fail in the download itself; log them as given.
    }
    return `${asset.provider} ${shown}`;
  }
  return `s3://${asset.bucket}/${asset.key}`;
}

async function hasContent(filePath: string): Promise<boolean> {
  try {
    const info = await stat(filePath);
    return info.isFile() && info.size > 0;
  } catch (error) {
    if (getErrorCode(error) === "ENOENT") {
      return false;
    }
    throw error;
  }
}
