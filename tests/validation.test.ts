import { mkdir, stat, writeFile } from "node:fs/promises";
import net, { type Server } from "node:net";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { parseConfig } from "../src/config/env.js";
import {
  checkConnectivity,
  checkDiskSpace,
  checkPorts,
  ensureWorkDir,
  isPortAvailable
} from "../src/config/validation.js";
import { ProvisionError } from "../src/errors.js";
import { createRecordingLogger, createTempDir } from "./helpers.js";

describe("ensureWorkDir", () => {
  let root = "";
  let cleanup: () => Promise<void> = async () => undefined;

  beforeEach(async () => {
    ({ dir: root, cleanup } = await createTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it("creates a missing directory", async () => {
    const dir = path.join(root, "a/b/work");
    await ensureWorkDir(dir, createRecordingLogger(), { dryRun: false });
    expect((await stat(dir)).isDirectory()).toBe(true);
  });

  it("only plans creation in dry-run", async () => {
    const dir = path.join(root, "work");
    const logger = createRecordingLogger();

    await ensureWorkDir(dir, logger, { dryRun: true });

    expect(logger.lines).toEqual([`dry-run: would create working directory ${dir}`]);
    await expect(stat(dir)).rejects.toThrow();
  });

  it("accepts an existing directory in dry-run without logging", async () => {
    const logger = createRecordingLogger();
    await ensureWorkDir(root, logger, { dryRun: true });
    expect(logger.lines).toEqual([]);
  });

  it.each([false, true])("rejects a regular file as the working directory (dryRun=%s)", async (dryRun) => {
    const file = path.join(root, "work");
    await writeFile(file, "not a directory");

    const attempt = ensureWorkDir(file, createRecordingLogger(), { dryRun });

    await expect(attempt).rejects.toBeInstanceOf(ProvisionError);
    await expect(attempt).rejects.toMatchObject({ kind: "config" });
  });

  it.each([false, true])("rejects a working directory below a regular file (dryRun=%s)", async (dryRun) => {
    const file = path.join(root, "blocker");
    await writeFile(file, "not a directory");

    const attempt = ensureWorkDir(path.join(file, "work"), createRecordingLogger(), { dryRun });

    await expect(attempt).rejects.toBeInstanceOf(ProvisionError);
    await expect(attempt).rejects.toThrow(`Working directory ${path.join(file, "work")} cannot be created`);
  });

  it("names the blocking path in dry-run", async () => {
    const file = path.join(root, "blocker");
    await writeFile(file, "not a directory");
    const dir = path.join(file, "nested/work");

    await expect(ensureWorkDir(dir, createRecordingLogger(), { dryRun: true })).rejects.toThrow(
      `Working directory ${dir} cannot be created (${file} is not a directory)`
    );
  });

  it("leaves an existing directory untouched", async () => {
    const dir = path.join(root, "work");
    await mkdir(dir);
    await writeFile(path.join(dir, ".env"), "HF_REPO=mine\n");

    await ensureWorkDir(dir, createRecordingLogger(), { dryRun: false });

    expect((await stat(path.join(dir, ".env"))).isFile()).toBe(true);
  });
});

describe("port checks", () => {
  let busy: Server;
  let busyPort = 0;

  const listen = (server: Server) =>
    new Promise<number>((resolve, reject) => {
      server.once("error", reject);
      server.listen(0, "127.0.0.1", () => {
        const address = server.address();
        if (!address || typeof address === "string") {
          reject(new Error("server has no TCP address"));
          return;
        }
        resolve(address.port);
      });
    });

  const close = (server: Server) =>
    new Promise<void>((resolve) => {
      server.close(() => resolve());
    });

  beforeEach(async () => {
    busy = net.createServer();
    busyPort = await listen(busy);
  });

  afterEach(async () => {
    await close(busy);
  });

  async function freePort(): Promise<number> {
    const server = net.createServer();
    const port = await listen(server);
    await close(server);
    return port;
  }

  it("detects a bound port", async () => {
    expect(await isPortAvailable(busyPort, "127.0.0.1")).toBe(false);
    expect(await isPortAvailable(await freePort(), "127.0.0.1")).toBe(true);
  });

  it("warns about a bound port and keeps going", async () => {
    const fastapiPort = await freePort();
    const config = parseConfig({
      FASTAPI_HOST: "127.0.0.1",
      FASTAPI_PORT: String(fastapiPort),
      COMFYUI_HOST: "127.0.0.1",
      COMFYUI_PORT: String(busyPort)
    });
    const logger = createRecordingLogger();

    const warnings = await checkPorts(config, logger);

    expect(warnings).toEqual([`port ${busyPort} (COMFYUI_PORT) is already in use`]);
    expect(logger.lines).toEqual([`warn: port ${busyPort} (COMFYUI_PORT) is already in use`]);
  });

  it("turns a failing probe into a warning", async () => {
    const config = parseConfig({});
    const probe = vi.fn(async (port: number): Promise<boolean> => {
      if (port === 8000) {
        throw new Error("probe failed");
      }
      return true;
    });

    expect(await checkPorts(config, createRecordingLogger(), probe)).toEqual([
      "could not check FASTAPI_PORT 8000: probe failed"
    ]);
  });
});

describe("checkDiskSpace", () => {
  const gib = 1024 ** 3;

  it("warns below the minimum", async () => {
    const logger = createRecordingLogger();

    const warnings = await checkDiskSpace("/srv/models", 20, logger, async () => 12.5 * gib);

    expect(warnings).toEqual(["only 12.5 GB free at /srv/models; 20 GB recommended"]);
    expect(logger.lines).toEqual(["warn: only 12.5 GB free at /srv/models; 20 GB recommended"]);
  });

  it("reports enough space as information", async () => {
    const logger = createRecordingLogger();

    expect(await checkDiskSpace("/srv/models", 20, logger, async () => 64 * gib)).toEqual([]);
    expect(logger.lines).toEqual(["info: 64.0 GB free at /srv/models"]);
  });

  it("is disabled by a minimum of 0", async () => {
    const probe = vi.fn(async () => 0);
    expect(await checkDiskSpace("/srv/models", 0, createRecordingLogger(), probe)).toEqual([]);
    expect(probe).not.toHaveBeenCalled();
  });

  it("turns a failing probe into a warning", async () => {
    const probe = async (): Promise<number> => {
      throw new Error("statfs unavailable");
    };
    expect(await checkDiskSpace("/srv/models", 20, createRecordingLogger(), probe)).toEqual([
      "could not check free space at /srv/models: statfs unavailable"
    ]);
  });

  it("measures the nearest existing directory by default", async () => {
    const { dir, cleanup } = await createTempDir();
    try {
      const warnings = await checkDiskSpace(path.join(dir, "not/yet/created"), 0.000001, createRecordingLogger());
      expect(warnings).toEqual([]);
    } finally {
      await cleanup();
    }
  });
});

describe("checkConnectivity", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("treats any response as reachable", async () => {
    const fetchMock = vi.fn(async () => new Response(null, { status: 403 }));
    vi.stubGlobal("fetch", fetchMock);

    expect(await checkConnectivity("https://hub.example.com", 1000)).toBe(true);
    expect(fetchMock).toHaveBeenCalledWith(
      "https://hub.example.com",
      expect.objectContaining({ method: "HEAD", redirect: "follow" })
    );
  });

  it("treats a network failure as unreachable", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );

    expect(await checkConnectivity("https://hub.example.com", 1000)).toBe(false);
  });
});
