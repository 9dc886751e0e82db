/* eslint-env node */
import process from 'node:process';
import { access } from 'node:fs/promises';
import { resolve } from 'node:path';
import {
  DEFAULT_ENGINE_CONFIG,
  loadEngineConfig,
  PROJECT_CONFIG_FILE,
  type EngineConfig,
} from '@acqpar/core';

/** Environment variable naming the engine config file. */
export const CONFIG_ENV_VAR = 'ACQPAR_CONFIG';

export type ConfigSource = 'flag' | 'env' | 'cwd' | 'defaults';

export interface CliConfigOptions {
  /** Value of the --config flag */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export interface ResolvedCliConfig {
  config: EngineConfig;
  source: ConfigSource;
  path?: string;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export function defaultEngineConfig(): EngineConfig {
  return { ...DEFAULT_ENGINE_CONFIG, arrayNames: [...DEFAULT_ENGINE_CONFIG.arrayNames] };
}

/**
 * Finds the engine config file: the --config flag, then ACQPAR_CONFIG, then
 * acqpar.config.yaml in the working directory. An explicitly named file must
 * exist; the working directory file is optional.
 */
export async function getCliConfigPath(
  options: CliConfigOptions = {},
): Promise<{ source: ConfigSource; path?: string }> {
  const cwd = options.cwd ?? process.cwd();
  if (options.configPath) {
    return { source: 'flag', path: resolve(cwd, options.configPath) };
  }
  const envPath = (options.env ?? process.env)[CONFIG_ENV_VAR];
  if (envPath) {
    return { source: 'env', path: resolve(cwd, envPath) };
  }
  const local = resolve(cwd, PROJECT_CONFIG_FILE);
  if (await exists(local)) {
    return { source: 'cwd', path: local };
  }
  return { source: 'defaults' };
}

export async function readCliConfig(options: CliConfigOptions = {}): Promise<ResolvedCliConfig> {
  const { source, path } = await getCliConfigPath(options);
  if (!path) {
    return { config: defaultEngineConfig(), source };
  }
  return { config: await loadEngineConfig(path), source, path };
}
