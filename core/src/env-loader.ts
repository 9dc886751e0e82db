import { config as dotenvConfig } from 'dotenv';
import { dirname, resolve } from 'node:path';
import { existsSync } from 'node:fs';
import type { Logger } from './logger.js';

/** File that marks the root of an acqpar project. */
export const PROJECT_CONFIG_FILE = 'acqpar.config.yaml';

export interface EnvLoaderOptions {
  /** Directory to start from (default: process.cwd()) */
  cwd?: string;
  logger?: Partial<Logger>;
}

export interface EnvLoaderResult {
  loaded: string[];
  /** Nearest directory holding acqpar.config.yaml, if any */
  projectRoot: string | null;
}

export function findProjectRoot(startDir: string): string | null {
  let current = resolve(startDir);
  for (;;) {
    if (existsSync(resolve(current, PROJECT_CONFIG_FILE))) {
      return current;
    }
    const parent = dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}

/**
 * Load environment variables from .env files.
 *
 * Looks in the following order (values already set are never overridden):
 * 1. The project root (nearest ancestor holding acqpar.config.yaml)
 * 2. The working directory
 */
export function loadEnv(options: EnvLoaderOptions = {}): EnvLoaderResult {
  const cwd = resolve(options.cwd ?? process.cwd());
  const projectRoot = findProjectRoot(cwd);
  const loaded: string[] = [];

  const candidates = projectRoot ? [resolve(projectRoot, '.env'), resolve(cwd, '.env')] : [resolve(cwd, '.env')];
  for (const envPath of candidates) {
    if (loaded.includes(envPath) || !existsSync(envPath)) {
      continue;
    }
    const result = dotenvConfig({ path: envPath, override: false });
    if (result.parsed) {
      loaded.push(envPath);
      options.logger?.debug?.('env.loaded', { path: envPath });
    }
  }

  return { loaded, projectRoot };
}
