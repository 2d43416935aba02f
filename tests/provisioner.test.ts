import { mkdir, readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { CloneInput, GitClient } from "../src/assets/gitClient.js";
import { parseConfig, type RawSettings } from "../src/config/env.js";
import type { HostCapabilities } from "../src/host/capabilities.js";
import { provision } from "../src/provisioner.js";
import type { InstallCommand } from "../src/runtime/installer.js";
import { createRecordingLogger, createTempDir } from "./helpers.js";

const largeGpu: HostCapabilities = {
  acceleratorPresent: true,
  acceleratorCount: 1,
  acceleratorName: "Test GPU",
  acceleratorMemoryMB: 24576,
  toolkitVersion: "12.2"
};

function createFakeGit(): GitClient & { clones: CloneInput[]; pulls: string[] } {
  const clones: CloneInput[] = [];
  const pulls: string[] = [];
  return {
    clones,
    pulls,
    clone: async (input) => {
      clones.push(input);
      await mkdir(path.join(input.destination, ".git"), { recursive: true });
    },
    pull: async (checkoutPath) => {
      pulls.push(checkoutPath);
    }
  };
}

describe("provision", () => {
  let root = "";
  let cleanup: () => Promise<void> = async () => undefined;

  beforeEach(async () => {
    ({ dir: root, cleanup } = await createTempDir());
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await cleanup();
  });

  const settings = (extra: RawSettings = {}): RawSettings => ({
    WORK_DIR: path.join(root, "work"),
    COMFYUI_DIR: path.join(root, "ComfyUI"),
    EXTERNAL_MODELS_DIR: path.join(root, "models"),
    ...extra
  });

  const deps = (git: GitClient, execute: (command: InstallCommand) => Promise<void>) => ({
    logger: createRecordingLogger(),
    configFile: null,
    detect: async () => largeGpu,
    git,
    objectStore: null,
    portProbe: async () => true,
    freeSpace: async () => 100 * 1024 ** 3,
    execute,
    now: () => new Date(2024, 0, 2, 3, 4, 5)
  });

  it("changes nothing in dry-run", async () => {
    await mkdir(path.join(root, "models/checkpoints"), { recursive: true });
    const fetchMock = vi.fn(async () => new Response("weights"));
    vi.stubGlobal("fetch", fetchMock);
    const git = createFakeGit();
    const execute = vi.fn(async () => undefined);

    const report = await provision(parseConfig(settings({ DRY_RUN: "true" })), deps(git, execute));

    expect(report.dryRun).toBe(true);
    expect(report.template).toBe("planned");
    expect(report.runtime).toBe("planned");
    expect(report.profile).toBe("high");
    expect(report.scriptPath).toBe(path.join(root, "work/start_comfyui.sh"));
    expect(report.assets.map((result) => [result.asset.id, result.status, result.reason])).toEqual([
      ["comfyui", "skipped", "dry-run"],
      ["comfyui-manager", "skipped", "dry-run"],
      ["flux1-dev", "skipped", "dry-run"],
      ["flux-ae", "skipped", "dry-run"],
      ["clip-l", "skipped", "dry-run"],
      ["t5xxl-fp16", "skipped", "dry-run"]
    ]);
    expect(report.bindings.find((binding) => binding.canonicalSubpath === "models/checkpoints")?.mode).toBe(
      "symlink"
    );
    expect(report.warnings).toEqual([]);

    expect(await readdir(root)).toEqual(["models"]);
    expect(await readdir(path.join(root, "models"))).toEqual(["checkpoints"]);
    expect(fetchMock).not.toHaveBeenCalled();
    expect(git.clones).toEqual([]);
    expect(execute).not.toHaveBeenCalled();
  });

  it("warns about a busy port and low disk space without stopping", async () => {
    const logger = createRecordingLogger();

    const report = await provision(parseConfig(settings({ DRY_RUN: "true", AUTO_DOWNLOAD_MODEL: "none" })), {
      ...deps(createFakeGit(), async () => undefined),
      logger,
      portProbe: async (port: number) => port !== 8188,
      freeSpace: async () => 5 * 1024 ** 3
    });

    expect(report.warnings).toEqual([
      "port 8188 (COMFYUI_PORT) is already in use",
      `only 5.0 GB free at ${path.join(root, "ComfyUI/models")}; 20 GB recommended`
    ]);
    expect(report.scriptPath).toBe(path.join(root, "work/start_comfyui.sh"));
  });

  it("reports an unknown model before changing anything", async () => {
    const attempt = provision(
      parseConfig(settings({ DRY_RUN: "true", AUTO_DOWNLOAD_MODEL: "nope.safetensors" })),
      deps(createFakeGit(), async () => undefined)
    );

    await expect(attempt).rejects.toThrow("Unknown model: nope.safetensors");
    expect(await readdir(root)).toEqual([]);
  });

  it("provisions once and is idempotent on the second run", async () => {
    const fetchMock = vi.fn(async () => new Response("vae-weights"));
    vi.stubGlobal("fetch", fetchMock);
    const git = createFakeGit();
    const executed: InstallCommand[] = [];
    const execute = async (command: InstallCommand) => {
      executed.push(command);
    };
    const config = parseConfig(settings({ AUTO_DOWNLOAD_MODEL: "ae.safetensors", HF_TOKEN: "test-hf-token" }));

    const first = await provision(config, deps(git, execute));

    expect(first.assets.map((result) => [result.asset.id, result.status])).toEqual([
      ["comfyui", "downloaded"],
      ["comfyui-manager", "downloaded"],
      ["flux-ae", "downloaded"]
    ]);
    expect(first.template).toBe("written");
    expect(first.runtime).toBe("installed");
    expect(executed.map((command) => command.file)).toEqual([
      "python3.10",
      path.join(root, "work/venv/bin/pip"),
      path.join(root, "work/venv/bin/pip")
    ]);
    expect(first.bindings.every((binding) => binding.mode === "local")).toBe(true);
    expect(await readFile(path.join(root, "ComfyUI/models/vae/ae.safetensors"), "utf8")).toBe("vae-weights");
    expect((await stat(path.join(root, "work/start_comfyui.sh"))).mode & 0o777).toBe(0o755);
    expect(await readFile(path.join(root, "work/start_comfyui.sh"), "utf8")).toContain(
      "export CUDA_MEMORY_FRACTION=0.9\n"
    );

    const second = await provision(config, deps(git, execute));

    expect(second.assets.map((result) => [result.asset.id, result.status, result.reason])).toEqual([
      ["comfyui", "downloaded", "updated"],
      ["comfyui-manager", "downloaded", "updated"],
      ["flux-ae", "skipped", "already present"]
    ]);
    expect(second.template).toBe("exists");
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(git.clones).toHaveLength(2);
    expect(git.pulls).toEqual([path.join(root, "ComfyUI"), path.join(root, "ComfyUI/custom_nodes/ComfyUI-Manager")]);
  });
});
