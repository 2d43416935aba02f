import path from "node:path";

import { AssetFetcher } from "./assets/assetFetcher.js";
import { applicationAsset, loadCatalog, selectAssets } from "./assets/catalog.js";
import type { GitClient } from "./assets/gitClient.js";
import type { ObjectStoreClient } from "./assets/objectStore.js";
import type { FetchResult } from "./assets/types.js";
import { ensureConfigTemplate, type TemplateOutcome } from "./config/configFile.js";
import type { EffectiveConfig } from "./config/env.js";
import { checkDiskSpace, checkPorts, ensureWorkDir, type FreeSpaceProbe } from "./config/validation.js";
import { detectHostCapabilities, type HostCapabilities } from "./host/capabilities.js";
import { deriveRuntimeFlags, memoryLaunchFlag, memoryProfile, type MemoryProfile } from "./host/runtimeFlags.js";
import type { Logger } from "./logging/logger.js";
import { TempFileRegistry } from "./runtime/cleanup.js";
import { type CommandExecutor, type InstallOutcome, installRuntime } from "./runtime/installer.js";
import { generateStartupScript } from "./service/startupScript.js";
import { bindDirectories, defaultBindingSpecs, type DirectoryBinding } from "./storage/directoryBinder.js";

export interface ProvisionDependencies {
  logger: Logger;
  /** Path of the configuration file the run loaded, if any. */
  configFile?: string | null;
  detect?: () => Promise<HostCapabilities>;
  git?: GitClient;
  objectStore?: ObjectStoreClient | null;
  portProbe?: (port: number, host: string) => Promise<boolean>;
  freeSpace?: FreeSpaceProbe;
  execute?: CommandExecutor;
  tempFiles?: TempFileRegistry;
  now?: () => Date;
}

export interface ProvisionReport {
  dryRun: boolean;
  capabilities: HostCapabilities;
  profile: MemoryProfile | null;
  runtimeFlags: Record<string, string>;
  template: TemplateOutcome | "skipped";
  bindings: DirectoryBinding[];
  assets: FetchResult[];
  runtime: InstallOutcome;
  scriptPath: string;
  warnings: string[];
}

/**
 * One idempotent pass: validate, bind directories, fetch assets, install the
 * runtime and write the startup script. Launching is left to the caller.
 */
export async function provision(config: EffectiveConfig, deps: ProvisionDependencies): Promise<ProvisionReport> {
  const { logger } = deps;
  const dryRun = config.DRY_RUN;
  const warnings: string[] = [];

  logger.step("validating configuration");
  await ensureWorkDir(config.WORK_DIR, logger, { dryRun });
  warnings.push(...(await checkPorts(config, logger, deps.portProbe)));
  warnings.push(
    ...(await checkDiskSpace(path.join(config.COMFYUI_DIR, "models"), config.MIN_FREE_DISK_GB, logger, deps.freeSpace))
  );

  const catalog = await loadCatalog(config.ASSET_CATALOG);
  const application = applicationAsset(config);
  const selected = selectAssets(catalog, config);
  logger.info(`selected ${selected.length} asset(s): ${selected.map((asset) => asset.id).join(", ") || "(none)"}`);

  let template: TemplateOutcome | "skipped" = "skipped";
  if (!deps.configFile) {
    template = (await ensureConfigTemplate(config, logger, { dryRun })).outcome;
  }

  logger.step("detecting host capabilities");
  const capabilities = await (deps.detect ?? (() => detectHostCapabilities(undefined, logger)))();
  const profile = memoryProfile(capabilities);
  const runtimeFlags = deriveRuntimeFlags(capabilities);
  if (capabilities.acceleratorPresent) {
    logger.info(
      `accelerator: ${capabilities.acceleratorName ?? "unknown"} ` +
        `(${capabilities.acceleratorMemoryMB ?? "?"} MiB, profile ${profile ?? "none"})`
    );
  } else {
    const message = "no accelerator detected; memory flags omitted";
    logger.warn(message);
    warnings.push(message);
  }

  const fetcher = new AssetFetcher({
    config,
    logger,
    git: deps.git,
    objectStore: deps.objectStore,
    tempFiles: deps.tempFiles
  });

  logger.step("installing application");
  const assets = await fetcher.fetchAll([application]);

  logger.step("binding model directories");
  const bindings = await bindDirectories(config.COMFYUI_DIR, config.EXTERNAL_MODELS_DIR, defaultBindingSpecs(), {
    dryRun,
    logger,
    now: deps.now
  });

  logger.step("fetching assets");
  assets.push(...(await fetcher.fetchAll(selected)));

  logger.step("installing runtime");
  const runtime = await installRuntime(config, capabilities, logger, deps.execute);

  logger.step("writing startup script");
  const launchFlag = memoryLaunchFlag(capabilities);
  const scriptPath = await generateStartupScript(config, runtimeFlags, {
    launchArgs: launchFlag ? [launchFlag] : [],
    dryRun,
    logger
  });

  for (const result of assets) {
    if (result.degraded) {
      warnings.push(`${result.asset.id}: ${result.reason ?? "degraded"}`);
    } else if (result.status === "failed") {
      warnings.push(`optional asset ${result.asset.id} failed: ${result.reason ?? "unknown error"}`);
    }
  }

  return { dryRun, capabilities, profile, runtimeFlags, template, bindings, assets, runtime, scriptPath, warnings };
}

export function summarizeReport(report: ProvisionReport, logger: Logger): void {
  const count = (status: FetchResult["status"]) => report.assets.filter((result) => result.status === status).length;
  logger.step("summary");
  logger.info(
    `assets: ${count("downloaded")} downloaded, ${count("skipped")} skipped, ${count("failed")} failed`
  );
  logger.info(
    `directories: ${report.bindings.filter((binding) => binding.mode === "symlink").length} linked, ` +
      `${report.bindings.filter((binding) => binding.mode === "local").length} local`
  );
  logger.info(`runtime: ${report.runtime}`);
  logger.info(`startup script: ${report.scriptPath}`);
  for (const warning of report.warnings) {
    logger.warn(warning);
  }
  if (report.dryRun) {
    logger.dryRun("no changes were made");
  }
}
