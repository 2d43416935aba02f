import { Command } from "commander";

import type { RawSettings } from "../config/env.js";

export interface ConfigOptions {
  workDir?: string;
  comfyuiDir?: string;
  pythonVersion?: string;
  autoInstall?: boolean;
  skipDeps?: boolean;
  dryRun?: boolean;
  model?: string;
  type?: string;
  allModels?: boolean;
  fastapiPort?: string;
  comfyuiPort?: string;
  ngrokToken?: string;
  config?: string;
}

export interface ProvisionOptions extends ConfigOptions {
  start?: boolean;
}

export interface CommandHandlers {
  provision(options: ProvisionOptions): Promise<void>;
  doctor(options: ConfigOptions): Promise<void>;
  initConfig(options: ConfigOptions & { force?: boolean }): Promise<void>;
}

export interface ProgramOutput {
  writeOut(text: string): void;
  writeErr(text: string): void;
}

export interface ProgramOptions {
  version?: string;
  /** Throw a CommanderError instead of calling process.exit (tests). */
  exitOverride?: boolean;
  output?: ProgramOutput;
}

function addConfigOptions(command: Command): Command {
  return command
    .option("--work-dir <dir>", "working directory for venv, config and startup script")
    .option("--comfyui-dir <dir>", "application install directory")
    .option("--python-version <version>", "python version used for the venv")
    .option("--auto-install", "do not ask for confirmation")
    .option("--skip-deps", "skip python dependency installation")
    .option("--dry-run", "show what would be done without changing anything")
    .option("--model <name>", "model file to download (\"none\" for no model)")
    .option("--type <type>", "download every catalog asset of this type")
    .option("--all-models", "download every model in the catalog")
    .option("--fastapi-port <port>", "API service port")
    .option("--comfyui-port <port>", "application port")
    .option("--ngrok-token <token>", "ngrok auth token")
    .option("--config <file>", "configuration file (default: first .env found)");
}

/** Maps parsed flags onto configuration keys; unset flags contribute nothing. */
export function cliSettings(options: ConfigOptions): RawSettings {
  const settings: RawSettings = {};
  const assign = (key: keyof RawSettings, value: string | undefined) => {
    if (value !== undefined) {
      settings[key] = value;
    }
  };
  const flag = (value: boolean | undefined) => (value ? "true" : undefined);

  assign("WORK_DIR", options.workDir);
  assign("COMFYUI_DIR", options.comfyuiDir);
  assign("PYTHON_VERSION", options.pythonVersion);
  assign("AUTO_INSTALL", flag(options.autoInstall));
  assign("SKIP_DEPS", flag(options.skipDeps));
  assign("DRY_RUN", flag(options.dryRun));
  assign("AUTO_DOWNLOAD_MODEL", options.model);
  assign("AUTO_DOWNLOAD_TYPE", options.type);
  assign("AUTO_DOWNLOAD_ALL", flag(options.allModels));
  assign("FASTAPI_PORT", options.fastapiPort);
  assign("COMFYUI_PORT", options.comfyuiPort);
  assign("NGROK_TOKEN", options.ngrokToken);
  return settings;
}

export function createProgram(handlers: CommandHandlers, options: ProgramOptions = {}): Command {
  const program = new Command();
  program
    .name("diffusion-provisioner")
    .description("Provision an image-generation service host: directories, models, runtime and startup script")
    .version(options.version ?? "0.0.0")
    .showHelpAfterError();

  if (options.exitOverride) {
    program.exitOverride();
  }
  if (options.output) {
    program.configureOutput(options.output);
  }

  addConfigOptions(program.command("provision", { isDefault: true }))
    .description("run one idempotent provisioning pass (default)")
    .option("--start", "launch the service afterwards and wait until it is ready")
    .action(async (opts: ProvisionOptions) => {
      await handlers.provision(opts);
    });

  addConfigOptions(program.command("doctor"))
    .description("print the effective configuration and detected host capabilities")
    .action(async (opts: ConfigOptions) => {
      await handlers.doctor(opts);
    });

  addConfigOptions(program.command("init-config"))
    .description("write a configuration template into the working directory")
    .option("--force", "replace an existing template")
    .action(async (opts: ConfigOptions & { force?: boolean }) => {
      await handlers.initConfig(opts);
    });

  return program;
}
