import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ParserErrorCode } from '@acqpar/core';
import { getCliConfigPath, readCliConfig } from './cli-config.js';

describe('cli config', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'acqpar-cli-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('uses the defaults when nothing is configured', async () => {
    const result = await readCliConfig({ cwd: dir, env: {} });
    expect(result).toEqual({
      config: { arrayNames: ['D', 'L', 'P', 'PL'], tolerance: 1e-9, strictFunctions: false },
      source: 'defaults',
    });
  });

  it('picks up acqpar.config.yaml in the working directory', async () => {
    await writeFile(join(dir, 'acqpar.config.yaml'), 'tolerance: 0.01\n', 'utf8');
    const result = await readCliConfig({ cwd: dir, env: {} });
    expect(result.source).toBe('cwd');
    expect(result.config.tolerance).toBe(0.01);
  });

  it('prefers ACQPAR_CONFIG over the working directory file', async () => {
    await writeFile(join(dir, 'acqpar.config.yaml'), 'tolerance: 0.01\n', 'utf8');
    await writeFile(join(dir, 'strict.yaml'), 'strictFunctions: true\n', 'utf8');
    const result = await readCliConfig({ cwd: dir, env: { ACQPAR_CONFIG: 'strict.yaml' } });
    expect(result).toMatchObject({ source: 'env', path: join(dir, 'strict.yaml') });
    expect(result.config.strictFunctions).toBe(true);
    expect(result.config.tolerance).toBe(1e-9);
  });

  it('prefers the --config flag over the environment', async () => {
    const resolved = await getCliConfigPath({
      cwd: dir,
      configPath: 'flag.yaml',
      env: { ACQPAR_CONFIG: 'env.yaml' },
    });
    expect(resolved).toEqual({ source: 'flag', path: join(dir, 'flag.yaml') });
  });

  it('fails when an explicitly named file is missing', async () => {
    await expect(readCliConfig({ cwd: dir, configPath: 'missing.yaml', env: {} })).rejects.toMatchObject({
      code: ParserErrorCode.FILE_LOAD_FAILED,
    });
  });
});
