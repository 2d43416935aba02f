import { mkdir } from "node:fs/promises";
import path from "node:path";

import { ensureConfigTemplate } from "../config/configFile.js";
import { CONFIG_KEYS, type ConfigKey, type EffectiveConfig } from "../config/env.js";
import { type LoadedConfig, loadEffectiveConfig } from "../config/resolver.js";
import { checkConnectivity, checkDiskSpace } from "../config/validation.js";
import { ProvisionError, formatError, isPermissionError } from "../errors.js";
import { detectHostCapabilities } from "../host/capabilities.js";
import { deriveRuntimeFlags, memoryLaunchFlag, memoryProfile, selectTorchIndex } from "../host/runtimeFlags.js";
import { createConsoleLogger, type Logger } from "../logging/logger.js";
import { provision, summarizeReport } from "../provisioner.js";
import { type TempFileRegistry, signalExitCode } from "../runtime/cleanup.js";
import { launchAndAwaitReady, stopService, superviseService } from "../service/lifecycle.js";
import { livenessUrlFromConfig } from "../service/liveness.js";
import { type CommandHandlers, type ConfigOptions, cliSettings, type ProvisionOptions } from "./program.js";
import { confirm } from "./prompt.js";

const SECRET_KEYS = new Set<ConfigKey>([
  "HF_TOKEN",
  "CIVITAI_TOKEN",
  "R2_ACCESS_KEY_ID",
  "R2_SECRET_ACCESS_KEY",
  "GITHUB_TOKEN",
  "NGROK_TOKEN"
]);

/** One `KEY=value` line per setting, secrets reduced to set/unset. */
export function describeConfig(config: EffectiveConfig): string[] {
  return CONFIG_KEYS.map((key) => {
    const value = config[key];
    if (SECRET_KEYS.has(key)) {
      return `${key}=${value === undefined ? "(unset)" : "(set)"}`;
    }
    return `${key}=${value === undefined ? "" : String(value)}`;
  });
}

async function loadFor(options: ConfigOptions, logger: Logger): Promise<LoadedConfig> {
  const loaded = await loadEffectiveConfig({
    cli: cliSettings(options),
    configPath: options.config
  });
  logger.info(
    loaded.configFile ? `configuration file: ${loaded.configFile}` : "no configuration file found; using defaults"
  );
  return loaded;
}

export interface CommandHandlerOptions {
  /** Drops the partial-download cleanup handlers once provisioning is over. */
  releaseSignalCleanup?: () => void;
}

export function createCommandHandlers(
  tempFiles: TempFileRegistry,
  handlerOptions: CommandHandlerOptions = {}
): CommandHandlers {
  return {
    async provision(options: ProvisionOptions) {
      const logger = createConsoleLogger("provision");
      const { config, configFile } = await loadFor(options, logger);
      logger.info(
        `work dir ${config.WORK_DIR}, app dir ${config.COMFYUI_DIR}, ` +
          `ports ${config.FASTAPI_PORT}/${config.COMFYUI_PORT}${config.DRY_RUN ? ", dry-run" : ""}`
      );

      if (!config.DRY_RUN && !config.AUTO_INSTALL && !(await confirm("Proceed with provisioning?"))) {
        logger.info("aborted");
        return;
      }

      const report = await provision(config, { logger, configFile, tempFiles });
      handlerOptions.releaseSignalCleanup?.();
      summarizeReport(report, logger);

      if (!options.start) {
        logger.info(`start the service with: ${report.scriptPath}`);
        return;
      }
      if (config.DRY_RUN) {
        logger.dryRun(`would launch ${report.scriptPath} and poll ${livenessUrlFromConfig(config)}`);
        return;
      }

      const { handle, readiness } = await launchAndAwaitReady(
        {
          scriptPath: report.scriptPath,
          listenHost: config.COMFYUI_HOST,
          listenPort: config.COMFYUI_PORT,
          livenessPath: config.HEALTH_PATH,
          maxAttempts: config.HEALTH_MAX_ATTEMPTS,
          intervalSeconds: config.HEALTH_INTERVAL_SECONDS,
          requestTimeoutMs: config.HEALTH_REQUEST_TIMEOUT_MS
        },
        { logger }
      );
      if (readiness.status !== "ready") {
        await stopService(handle);
        throw new ProvisionError(
          readiness.status === "timedOut"
            ? `service did not become ready after ${readiness.attempts} attempt(s)`
            : `service exited with code ${readiness.exitCode ?? "none"} before becoming ready`,
          "runtime"
        );
      }

      const { exitCode, signal } = await superviseService(handle, { logger });
      if (signal) {
        process.exitCode = signalExitCode(signal);
      }
      logger.info(`service exited with code ${exitCode ?? "none"}`);
    },

    async doctor(options: ConfigOptions) {
      const logger = createConsoleLogger("doctor");
      const { config } = await loadFor(options, logger);

      logger.step("effective configuration");
      for (const line of describeConfig(config)) {
        logger.info(`  ${line}`);
      }

      logger.step("host capabilities");
      const capabilities = await detectHostCapabilities(undefined, logger);
      if (capabilities.acceleratorPresent) {
        logger.info(
          `  accelerator: ${capabilities.acceleratorName ?? "unknown"} x${capabilities.acceleratorCount}, ` +
            `${capabilities.acceleratorMemoryMB ?? "?"} MiB, driver ${capabilities.driverVersion ?? "unknown"}`
        );
      } else {
        logger.warn("  no accelerator detected");
      }
      logger.info(`  toolkit: ${capabilities.toolkitVersion ?? "not found"}`);
      logger.info(`  memory profile: ${memoryProfile(capabilities) ?? "none"}`);
      for (const [name, value] of Object.entries(deriveRuntimeFlags(capabilities)).sort()) {
        logger.info(`  ${name}=${value}`);
      }
      logger.info(`  launch flag: ${memoryLaunchFlag(capabilities) ?? "none"}`);
      logger.info(`  torch wheels: ${selectTorchIndex(capabilities).url}`);

      logger.step("host resources");
      await checkDiskSpace(path.join(config.COMFYUI_DIR, "models"), config.MIN_FREE_DISK_GB, logger);
      if (await checkConnectivity(config.CONNECTIVITY_URL, config.HEALTH_REQUEST_TIMEOUT_MS)) {
        logger.info(`  ${config.CONNECTIVITY_URL} is reachable`);
      } else {
        logger.warn(`  ${config.CONNECTIVITY_URL} is not reachable; downloads will fail`);
      }
    },

    async initConfig(options: ConfigOptions & { force?: boolean }) {
      const logger = createConsoleLogger("init-config");
      const { config } = await loadFor(options, logger);
      if (!config.DRY_RUN) {
        try {
          await mkdir(config.WORK_DIR, { recursive: true });
        } catch (error) {
          throw new ProvisionError(
            `Working directory ${config.WORK_DIR} cannot be created: ${formatError(error)}`,
            isPermissionError(error) ? "permission" : "config",
            { cause: error }
          );
        }
      }
      const result = await ensureConfigTemplate(config, logger, { dryRun: config.DRY_RUN, force: options.force });
      if (result.outcome === "exists") {
        logger.info(`${result.path} (or .env) already exists; use --force to rewrite the template`);
      }
    }
  };
}
