import { access } from "node:fs/promises";

import { loadEffectiveConfig } from "../src/config/resolver.js";
import { formatError } from "../src/errors.js";
import { createConsoleLogger } from "../src/logging/logger.js";
import { signalExitCode } from "../src/runtime/cleanup.js";
import { launchAndAwaitReady, stopService, superviseService } from "../src/service/lifecycle.js";
import { startupScriptPath } from "../src/service/startupScript.js";

const logger = createConsoleLogger("service:start");

async function main(): Promise<void> {
  const { config } = await loadEffectiveConfig();
  const scriptPath = startupScriptPath(config);
  try {
    await access(scriptPath);
  } catch {
    throw new Error(`${scriptPath} not found; run the provisioner first`);
  }

  const { handle, readiness } = await launchAndAwaitReady(
    {
      scriptPath,
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
    process.exit(1);
  }

  const { exitCode, signal } = await superviseService(handle, { logger });
  logger.info(`service exited with code ${exitCode ?? "none"}`);
  process.exit(signal ? (signalExitCode(signal) ?? 1) : (exitCode ?? 1));
}

main().catch((error) => {
  console.error(`[service:start] failed: ${formatError(error)}`);
  process.exit(1);
});
