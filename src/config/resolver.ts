import os from "node:os";

import { findConfigFile, readConfigFile } from "./configFile.js";
import { DEFAULT_WORK_DIR, type EffectiveConfig, parseConfig, pickSettings, type RawSettings } from "./env.js";

export interface ConfigLayers {
  defaults?: RawSettings;
  file?: RawSettings;
  env?: Record<string, string | undefined>;
  cli?: RawSettings;
}

/**
 * Merges the layers with precedence cli > env > file > defaults. Built-in
 * defaults from the schema fill whatever no layer sets.
 */
export function resolveConfig(layers: ConfigLayers): EffectiveConfig {
  const merged: RawSettings = {
    ...pickSettings(layers.defaults ?? {}),
    ...pickSettings(layers.file ?? {}),
    ...pickSettings(layers.env ?? {}),
    ...pickSettings(layers.cli ?? {})
  };
  return parseConfig(merged);
}

export interface LoadConfigOptions {
  cli?: RawSettings;
  env?: Record<string, string | undefined>;
  configPath?: string;
  cwd?: string;
  homeDir?: string;
}

export interface LoadedConfig {
  config: EffectiveConfig;
  configFile: string | null;
}

export async function loadEffectiveConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  const cli = options.cli ?? {};
  const workDir = cli.WORK_DIR ?? nonEmpty(env.WORK_DIR) ?? DEFAULT_WORK_DIR;

  const configFile = await findConfigFile({
    workDir,
    homeDir: options.homeDir ?? os.homedir(),
    cwd: options.cwd ?? process.cwd(),
    explicitPath: options.configPath
  });
  const file = configFile ? await readConfigFile(configFile, env) : {};

  return {
    config: resolveConfig({ file, env, cli }),
    configFile
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
