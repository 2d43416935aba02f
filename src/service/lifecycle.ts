import { setTimeout as delay } from "node:timers/promises";

import { execa } from "execa";

import { formatError, getErrorCode } from "../errors.js";
import { type Logger, silentLogger } from "../logging/logger.js";
import type { SignalSource } from "../runtime/cleanup.js";
import { createHttpLivenessProbe, type LivenessProbe, livenessUrl } from "./liveness.js";

const isWindows = process.platform === "win32";

export interface ServiceProcess {
  readonly pid: number | undefined;
  /** Resolves with the exit code (null when killed by a signal or never started). */
  readonly exited: Promise<number | null>;
  hasExited(): boolean;
  kill(signal: NodeJS.Signals): void;
}

export interface ServiceHandle {
  process: ServiceProcess;
  scriptPath: string;
  listenHost: string;
  listenPort: number;
  livenessPath: string;
}

export type ReadinessResult =
  | { status: "ready"; attempts: number }
  | { status: "timedOut"; attempts: number }
  | { status: "exited"; attempts: number; exitCode: number | null };

export type Sleep = (ms: number) => Promise<void>;
export type ServiceSpawner = (scriptPath: string) => ServiceProcess;

const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

export const spawnService: ServiceSpawner = (scriptPath) => {
  const subprocess = execa(scriptPath, [], {
    stdio: "inherit",
    detached: !isWindows,
    reject: false
  });

  let exitCode: number | null | undefined;
  const exited = subprocess.then((result) => {
    exitCode = result.exitCode ?? null;
    return exitCode;
  });

  return {
    pid: subprocess.pid,
    exited,
    hasExited: () => exitCode !== undefined,
    kill: (signal) => {
      if (exitCode !== undefined) {
        return;
      }
      try {
        if (!isWindows && subprocess.pid) {
          // Negative pid signals the whole process group started by the script.
          process.kill(-subprocess.pid, signal);
          return;
        }
        subprocess.kill(signal);
      } catch (error) {
        if (getErrorCode(error) !== "ESRCH") {
          throw error;
        }
      }
    }
  };
};

export interface AwaitReadyOptions {
  maxAttempts: number;
  intervalSeconds: number;
  sleep?: Sleep;
  logger?: Logger;
  process?: ServiceProcess;
}

/**
 * Polls until the probe succeeds or attempts run out. Timing out and an early
 * exit of the launched process are results, not errors.
 */
export async function awaitReady(probe: LivenessProbe, options: AwaitReadyOptions): Promise<ReadinessResult> {
  const sleep = options.sleep ?? defaultSleep;
  const logger = options.logger ?? silentLogger;

  for (let attempt = 1; attempt <= options.maxAttempts; attempt += 1) {
    if (options.process?.hasExited()) {
      return { status: "exited", attempts: attempt - 1, exitCode: await options.process.exited };
    }

    let alive: boolean;
    try {
      alive = await probe();
    } catch {
      alive = false;
    }
    if (alive) {
      return { status: "ready", attempts: attempt };
    }

    logger.info(`waiting for service (${attempt}/${options.maxAttempts})`);
    if (attempt < options.maxAttempts) {
      await sleep(options.intervalSeconds * 1000);
    }
  }

  return { status: "timedOut", attempts: options.maxAttempts };
}

export interface LaunchOptions {
  scriptPath: string;
  listenHost: string;
  listenPort: number;
  livenessPath: string;
  maxAttempts: number;
  intervalSeconds: number;
  requestTimeoutMs?: number;
}

export interface LaunchDependencies {
  spawn?: ServiceSpawner;
  probe?: LivenessProbe;
  sleep?: Sleep;
  logger?: Logger;
}

export async function launchAndAwaitReady(
  options: LaunchOptions,
  deps: LaunchDependencies = {}
): Promise<{ handle: ServiceHandle; readiness: ReadinessResult }> {
  const logger = deps.logger ?? silentLogger;
  const spawn = deps.spawn ?? spawnService;
  const url = livenessUrl(options.listenHost, options.listenPort, options.livenessPath);
  const probe = deps.probe ?? createHttpLivenessProbe(url, options.requestTimeoutMs ?? 5000);

  logger.info(`launching ${options.scriptPath}`);
  const serviceProcess = spawn(options.scriptPath);
  const handle: ServiceHandle = {
    process: serviceProcess,
    scriptPath: options.scriptPath,
    listenHost: options.listenHost,
    listenPort: options.listenPort,
    livenessPath: options.livenessPath
  };

  const readiness = await awaitReady(probe, {
    maxAttempts: options.maxAttempts,
    intervalSeconds: options.intervalSeconds,
    sleep: deps.sleep,
    logger,
    process: serviceProcess
  });

  if (readiness.status === "ready") {
    logger.success(`service ready at ${url} after ${readiness.attempts} attempt(s)`);
  } else if (readiness.status === "timedOut") {
    logger.warn(`service not ready after ${readiness.attempts} attempt(s)`);
  } else {
    logger.warn(`service exited before becoming ready (exit code ${readiness.exitCode ?? "none"})`);
  }
  return { handle, readiness };
}

/** SIGTERM to the process group, then SIGKILL once the grace period passes. */
export async function stopService(handle: ServiceHandle, graceMs = 5000): Promise<number | null> {
  handle.process.kill("SIGTERM");
  const stopped = await Promise.race([
    handle.process.exited.then(() => true),
    delay(graceMs, false, { ref: false })
  ]);
  if (!stopped) {
    handle.process.kill("SIGKILL");
  }
  return handle.process.exited;
}

export interface SuperviseOptions {
  signals?: SignalSource;
  logger?: Logger;
  graceMs?: number;
}

/**
 * Waits for a running service to exit. SIGINT or SIGTERM stops it through
 * `stopService`; the signal that did so is returned alongside the exit code.
 */
export async function superviseService(
  handle: ServiceHandle,
  options: SuperviseOptions = {}
): Promise<{ exitCode: number | null; signal: NodeJS.Signals | null }> {
  const signals = options.signals ?? process;
  const logger = options.logger ?? silentLogger;
  let received: NodeJS.Signals | null = null;

  const forward = (signal: NodeJS.Signals) => (): void => {
    if (received) {
      return;
    }
    received = signal;
    logger.warn(`received ${signal}; stopping service`);
    stopService(handle, options.graceMs).catch((error: unknown) => {
      logger.error(`failed to stop service: ${formatError(error)}`);
    });
  };
  const onInterrupt = forward("SIGINT");
  const onTerminate = forward("SIGTERM");
  signals.on("SIGINT", onInterrupt);
  signals.on("SIGTERM", onTerminate);

  try {
    const exitCode = await handle.process.exited;
    return { exitCode, signal: received };
  } finally {
    signals.off("SIGINT", onInterrupt);
    signals.off("SIGTERM", onTerminate);
  }
}
