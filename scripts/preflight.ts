import { access } from "node:fs/promises";
import path from "node:path";

import { execa } from "execa";

import { loadEffectiveConfig } from "../src/config/resolver.js";
import { checkConnectivity, statfsFreeBytes } from "../src/config/validation.js";
import { formatError } from "../src/errors.js";
import { createHttpLivenessProbe, livenessUrlFromConfig } from "../src/service/liveness.js";
import { startupScriptPath } from "../src/service/startupScript.js";

async function main(): Promise<void> {
  let hasError = false;
  const { config, configFile } = await loadEffectiveConfig();
  console.log(`[check] configuration (${configFile ?? "defaults only"})`);
  console.log(`  ok: work dir ${config.WORK_DIR}, app dir ${config.COMFYUI_DIR}`);

  console.log("[check] GPU info via nvidia-smi");
  try {
    const { stdout } = await execa("nvidia-smi", [
      "--query-gpu=name,memory.total,driver_version",
      "--format=csv,noheader"
    ]);
    console.log(`  ok: ${stdout}`);
  } catch (error) {
    hasError = true;
    console.log(`  fail: ${formatError(error)}`);
  }

  for (const tool of ["git", `python${config.PYTHON_VERSION}`]) {
    console.log(`[check] ${tool}`);
    try {
      const { stdout } = await execa(tool, ["--version"]);
      console.log(`  ok: ${stdout}`);
    } catch (error) {
      hasError = true;
      console.log(`  fail: ${formatError(error)}`);
    }
  }

  for (const required of [path.join(config.COMFYUI_DIR, "main.py"), startupScriptPath(config)]) {
    console.log(`[check] ${path.basename(required)}`);
    try {
      await access(required);
      console.log(`  ok: ${required}`);
    } catch {
      hasError = true;
      console.log(`  fail: file not found (${required}); run the provisioner first`);
    }
  }

  const modelsDir = path.join(config.COMFYUI_DIR, "models");
  console.log("[check] free disk space");
  try {
    const freeGB = (await statfsFreeBytes(modelsDir)) / 1024 ** 3;
    const verdict = freeGB < config.MIN_FREE_DISK_GB ? `low (${config.MIN_FREE_DISK_GB} GB recommended)` : "ok";
    console.log(`  ${verdict}: ${freeGB.toFixed(1)} GB free at ${modelsDir}`);
  } catch (error) {
    console.log(`  unknown: ${formatError(error)}`);
  }

  console.log("[check] internet connectivity");
  if (await checkConnectivity(config.CONNECTIVITY_URL, config.HEALTH_REQUEST_TIMEOUT_MS)) {
    console.log(`  ok: ${config.CONNECTIVITY_URL}`);
  } else {
    console.log(`  warn: ${config.CONNECTIVITY_URL} is not reachable; downloads will fail`);
  }

  const url = livenessUrlFromConfig(config);
  console.log("[check] service endpoint");
  if (await createHttpLivenessProbe(url, config.HEALTH_REQUEST_TIMEOUT_MS)()) {
    console.log(`  ok: ${url}`);
  } else {
    console.log(`  not running: ${url} is not reachable yet`);
  }

  if (hasError) {
    console.log("\nPreflight result: NOT READY");
    process.exit(1);
  }
  console.log("\nPreflight result: READY");
}

main().catch((error) => {
  console.error(`preflight crashed: ${formatError(error)}`);
  process.exit(1);
});
