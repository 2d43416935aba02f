import { rm } from "node:fs/promises";

import { formatError } from "../errors.js";
import type { Logger } from "../logging/logger.js";

/** Tracks partial downloads so an interrupted run can remove them. */
export class TempFileRegistry {
  private readonly paths = new Set<string>();

  track(filePath: string): void {
    this.paths.add(filePath);
  }

  release(filePath: string): void {
    this.paths.delete(filePath);
  }

  list(): string[] {
    return [...this.paths];
  }

  async removeAll(): Promise<string[]> {
    const removed: string[] = [];
    for (const filePath of this.paths) {
      await rm(filePath, { force: true });
      removed.push(filePath);
    }
    this.paths.clear();
    return removed;
  }
}

const HANDLED_SIGNALS = [
  { signal: "SIGINT", exitCode: 130 },
  { signal: "SIGTERM", exitCode: 143 }
] as const;

export function signalExitCode(signal: NodeJS.Signals): number | undefined {
  return HANDLED_SIGNALS.find((entry) => entry.signal === signal)?.exitCode;
}

export type SignalSource = Pick<NodeJS.EventEmitter, "on" | "off">;

export interface SignalCleanupOptions {
  exit?: (code: number) => void;
  signals?: SignalSource;
}

/** Returns a function that removes the handlers again; calling it twice is harmless. */
export function installSignalCleanup(
  registry: TempFileRegistry,
  logger: Logger,
  options: SignalCleanupOptions = {}
): () => void {
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const signals = options.signals ?? process;
  let handling = false;

  const handlers = HANDLED_SIGNALS.map(({ signal, exitCode }) => {
    const handler = (): void => {
      if (handling) {
        return;
      }
      handling = true;
      logger.warn(`received ${signal}; cleaning up`);
      registry.removeAll().then(
        (removed) => {
          for (const filePath of removed) {
            logger.info(`removed ${filePath}`);
          }
          exit(exitCode);
        },
        (error: unknown) => {
          logger.error(`cleanup failed: ${formatError(error)}`);
          exit(exitCode);
        }
      );
    };
    signals.on(signal, handler);
    return { signal, handler };
  });

  return () => {
    for (const { signal, handler } of handlers) {
      signals.off(signal, handler);
    }
  };
}
