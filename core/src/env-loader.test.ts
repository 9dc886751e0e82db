import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { resolve } from 'node:path';
import { existsSync } from 'node:fs';
import { config as dotenvConfig } from 'dotenv';
import { findProjectRoot, loadEnv } from './env-loader.js';

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
}));

vi.mock('dotenv', () => ({
  config: vi.fn(),
}));

describe('loadEnv', () => {
  const mockExistsSync = vi.mocked(existsSync);
  const mockDotenvConfig = vi.mocked(dotenvConfig);
  const cwd = resolve('/work/project/experiments');
  const root = resolve('/work/project');

  beforeEach(() => {
    vi.clearAllMocks();
    mockDotenvConfig.mockReturnValue({ parsed: undefined });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('loads nothing when no .env file exists', () => {
    mockExistsSync.mockReturnValue(false);

    const result = loadEnv({ cwd });

    expect(result).toEqual({ loaded: [], projectRoot: null });
    expect(mockDotenvConfig).not.toHaveBeenCalled();
  });

  it('loads the project root .env before the working directory one', () => {
    mockExistsSync.mockImplementation(
      (path) =>
        path === resolve(root, 'acqpar.config.yaml') || path === resolve(root, '.env') || path === resolve(cwd, '.env'),
    );
    mockDotenvConfig.mockReturnValue({ parsed: { ACQPAR_CONFIG: 'acqpar.config.yaml' } });

    const result = loadEnv({ cwd });

    expect(result.projectRoot).toBe(root);
    expect(result.loaded).toEqual([resolve(root, '.env'), resolve(cwd, '.env')]);
    expect(mockDotenvConfig).toHaveBeenNthCalledWith(1, { path: resolve(root, '.env'), override: false });
    expect(mockDotenvConfig).toHaveBeenNthCalledWith(2, { path: resolve(cwd, '.env'), override: false });
  });

  it('falls back to the working directory without a project root', () => {
    mockExistsSync.mockImplementation((path) => path === resolve(cwd, '.env'));
    mockDotenvConfig.mockReturnValue({ parsed: {} });
    const debug = vi.fn();

    const result = loadEnv({ cwd, logger: { debug } });

    expect(result.loaded).toEqual([resolve(cwd, '.env')]);
    expect(debug).toHaveBeenCalledWith('env.loaded', { path: resolve(cwd, '.env') });
  });

  it('reads the project root .env once when it is the working directory', () => {
    mockExistsSync.mockReturnValue(true);
    mockDotenvConfig.mockReturnValue({ parsed: {} });

    const result = loadEnv({ cwd: root });

    expect(result.loaded).toEqual([resolve(root, '.env')]);
    expect(mockDotenvConfig).toHaveBeenCalledTimes(1);
  });
});

describe('findProjectRoot', () => {
  it('walks up to the nearest directory with acqpar.config.yaml', () => {
    vi.mocked(existsSync).mockImplementation((path) => path === resolve('/work/acqpar.config.yaml'));
    expect(findProjectRoot('/work/a/b')).toBe(resolve('/work'));
  });
});
