import { EventEmitter } from "node:events";
import type { Server } from "node:http";

import express from "express";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  type ServiceProcess,
  awaitReady,
  launchAndAwaitReady,
  stopService,
  superviseService
} from "../src/service/lifecycle.js";
import { createHttpLivenessProbe, livenessUrl } from "../src/service/liveness.js";
import { createRecordingLogger } from "./helpers.js";

function createFakeProcess(exitOn: NodeJS.Signals[] = []) {
  const kills: NodeJS.Signals[] = [];
  let exitCode: number | null | undefined;
  let finish: (code: number | null) => void = () => undefined;
  const exited = new Promise<number | null>((resolve) => {
    finish = (code) => {
      exitCode = code;
      resolve(code);
    };
  });
  const serviceProcess: ServiceProcess = {
    pid: 4242,
    exited,
    hasExited: () => exitCode !== undefined,
    kill: (signal) => {
      kills.push(signal);
      if (exitOn.includes(signal)) {
        finish(signal === "SIGKILL" ? null : 0);
      }
    }
  };
  return { serviceProcess, kills, finish: (code: number | null) => finish(code) };
}

function recordingSleep() {
  const waits: number[] = [];
  return { waits, sleep: async (ms: number) => void waits.push(ms) };
}

describe("awaitReady", () => {
  it("returns ready on the first successful probe", async () => {
    const probe = vi
      .fn<() => Promise<boolean>>()
      .mockResolvedValueOnce(false)
      .mockResolvedValueOnce(false)
      .mockResolvedValue(true);
    const { waits, sleep } = recordingSleep();

    const result = await awaitReady(probe, { maxAttempts: 30, intervalSeconds: 10, sleep });

    expect(result).toEqual({ status: "ready", attempts: 3 });
    expect(waits).toEqual([10000, 10000]);
  });

  it("times out after the last attempt without throwing", async () => {
    const probe = vi.fn(async () => false);
    const { waits, sleep } = recordingSleep();

    const result = await awaitReady(probe, { maxAttempts: 4, intervalSeconds: 2, sleep });

    expect(result).toEqual({ status: "timedOut", attempts: 4 });
    expect(probe).toHaveBeenCalledTimes(4);
    expect(waits).toEqual([2000, 2000, 2000]);
  });

  it("counts a throwing probe as not ready", async () => {
    const probe = vi.fn(async (): Promise<boolean> => {
      throw new Error("connection refused");
    });
    const { sleep } = recordingSleep();

    expect(await awaitReady(probe, { maxAttempts: 2, intervalSeconds: 0, sleep })).toEqual({
      status: "timedOut",
      attempts: 2
    });
  });

  it("stops polling once the launched process has exited", async () => {
    const fake = createFakeProcess();
    fake.finish(2);
    await fake.serviceProcess.exited;
    const probe = vi.fn(async () => true);

    const result = await awaitReady(probe, {
      maxAttempts: 5,
      intervalSeconds: 1,
      sleep: recordingSleep().sleep,
      process: fake.serviceProcess
    });

    expect(result).toEqual({ status: "exited", attempts: 0, exitCode: 2 });
    expect(probe).not.toHaveBeenCalled();
  });
});

describe("launchAndAwaitReady", () => {
  it("times out after exactly 3 attempts at a 0 second interval without throwing", async () => {
    const fake = createFakeProcess();
    const probe = vi.fn(async () => false);

    const { readiness } = await launchAndAwaitReady(
      {
        scriptPath: "/srv/work/start_comfyui.sh",
        listenHost: "127.0.0.1",
        listenPort: 8188,
        livenessPath: "/system_stats",
        maxAttempts: 3,
        intervalSeconds: 0
      },
      { spawn: () => fake.serviceProcess, probe }
    );

    expect(readiness).toEqual({ status: "timedOut", attempts: 3 });
    expect(probe).toHaveBeenCalledTimes(3);
    expect(fake.kills).toEqual([]);
  });
});

describe("liveness over HTTP", () => {
  let server: Server;
  let port = 0;

  beforeEach(async () => {
    const app = express();
    app.get("/system_stats", (_req, res) => {
      res.json({ system: { os: "posix" } });
    });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("server has no TCP address");
    }
    port = address.port;
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
  });

  it("reports a responding endpoint as alive", async () => {
    const probe = createHttpLivenessProbe(livenessUrl("0.0.0.0", port, "/system_stats"), 1000);
    expect(await probe()).toBe(true);
  });

  it("reports a non-2xx status as not alive", async () => {
    const probe = createHttpLivenessProbe(livenessUrl("127.0.0.1", port, "/missing"), 1000);
    expect(await probe()).toBe(false);
  });

  it("launches the script and waits for the endpoint", async () => {
    const fake = createFakeProcess();
    const spawn = vi.fn(() => fake.serviceProcess);

    const { handle, readiness } = await launchAndAwaitReady(
      {
        scriptPath: "/srv/work/start_comfyui.sh",
        listenHost: "0.0.0.0",
        listenPort: port,
        livenessPath: "/system_stats",
        maxAttempts: 3,
        intervalSeconds: 0
      },
      { spawn, sleep: recordingSleep().sleep }
    );

    expect(spawn).toHaveBeenCalledWith("/srv/work/start_comfyui.sh");
    expect(readiness).toEqual({ status: "ready", attempts: 1 });
    expect(handle).toMatchObject({ listenHost: "0.0.0.0", listenPort: port, livenessPath: "/system_stats" });
  });
});

describe("livenessUrl", () => {
  it("probes wildcard listen hosts on loopback", () => {
    expect(livenessUrl("0.0.0.0", 8188, "/system_stats")).toBe("http://127.0.0.1:8188/system_stats");
    expect(livenessUrl("::1", 8188, "/system_stats")).toBe("http://[::1]:8188/system_stats");
    expect(livenessUrl("comfy.internal", 8188, "/")).toBe("http://comfy.internal:8188/");
  });
});

describe("stopService", () => {
  const handleFor = (serviceProcess: ServiceProcess) => ({
    process: serviceProcess,
    scriptPath: "/srv/work/start_comfyui.sh",
    listenHost: "0.0.0.0",
    listenPort: 8188,
    livenessPath: "/system_stats"
  });

  it("stops with SIGTERM when the service honours it", async () => {
    const fake = createFakeProcess(["SIGTERM"]);
    expect(await stopService(handleFor(fake.serviceProcess), 1000)).toBe(0);
    expect(fake.kills).toEqual(["SIGTERM"]);
  });

  it("escalates to SIGKILL after the grace period", async () => {
    const fake = createFakeProcess(["SIGKILL"]);
    expect(await stopService(handleFor(fake.serviceProcess), 10)).toBeNull();
    expect(fake.kills).toEqual(["SIGTERM", "SIGKILL"]);
  });
});

describe("superviseService", () => {
  const handleFor = (serviceProcess: ServiceProcess) => ({
    process: serviceProcess,
    scriptPath: "/srv/work/start_comfyui.sh",
    listenHost: "0.0.0.0",
    listenPort: 8188,
    livenessPath: "/system_stats"
  });

  it("returns the exit code of a service that ends by itself", async () => {
    const fake = createFakeProcess();
    const signals = new EventEmitter();

    const supervised = superviseService(handleFor(fake.serviceProcess), { signals });
    fake.finish(0);

    expect(await supervised).toEqual({ exitCode: 0, signal: null });
    expect(fake.kills).toEqual([]);
    expect(signals.listenerCount("SIGINT")).toBe(0);
  });

  it("stops the service on SIGINT and reports the signal", async () => {
    const fake = createFakeProcess(["SIGTERM"]);
    const signals = new EventEmitter();
    const logger = createRecordingLogger();

    const supervised = superviseService(handleFor(fake.serviceProcess), { signals, logger, graceMs: 1000 });
    signals.emit("SIGINT");
    signals.emit("SIGINT");

    expect(await supervised).toEqual({ exitCode: 0, signal: "SIGINT" });
    expect(fake.kills).toEqual(["SIGTERM"]);
    expect(logger.lines).toEqual(["warn: received SIGINT; stopping service"]);
    expect(signals.listenerCount("SIGINT")).toBe(0);
    expect(signals.listenerCount("SIGTERM")).toBe(0);
  });

  it("escalates to SIGKILL when the service ignores SIGTERM", async () => {
    const fake = createFakeProcess(["SIGKILL"]);
    const signals = new EventEmitter();

    const supervised = superviseService(handleFor(fake.serviceProcess), { signals, graceMs: 10 });
    signals.emit("SIGTERM");

    expect(await supervised).toEqual({ exitCode: null, signal: "SIGTERM" });
    expect(fake.kills).toEqual(["SIGTERM", "SIGKILL"]);
  });
});
