#!/usr/bin/env node
import { CommanderError } from "commander";

import { createCommandHandlers } from "./cli/commands.js";
import { createProgram } from "./cli/program.js";
import { ProvisionError, formatError } from "./errors.js";
import { createConsoleLogger } from "./logging/logger.js";
import { TempFileRegistry, installSignalCleanup } from "./runtime/cleanup.js";
import { PACKAGE_VERSION } from "./version.js";

async function main(): Promise<void> {
  const tempFiles = new TempFileRegistry();
  const removeSignalHandlers = installSignalCleanup(tempFiles, createConsoleLogger("provision"));
  try {
    const handlers = createCommandHandlers(tempFiles, { releaseSignalCleanup: removeSignalHandlers });
    await createProgram(handlers, { version: PACKAGE_VERSION }).parseAsync(process.argv);
  } finally {
    removeSignalHandlers();
  }
}

main().catch((error: unknown) => {
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }
  const label = error instanceof ProvisionError ? `${error.kind} error` : "error";
  console.error(`[provision] ${label}: ${formatError(error)}`);
  process.exit(1);
});
