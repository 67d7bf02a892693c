import { describe, it, expect, afterEach } from 'vitest';
import * as path from 'path';
import { getConfigDir, getConfigPath } from './paths';

describe('getConfigDir', () => {
  const saved = process.env.SSDB_CONFIG_DIR;

  afterEach(() => {
    if (saved === undefined) delete process.env.SSDB_CONFIG_DIR;
    else process.env.SSDB_CONFIG_DIR = saved;
  });

  it('ends with ssdb', () => {
    delete process.env.SSDB_CONFIG_DIR;
    expect(getConfigDir()).toMatch(/ssdb$/);
  });

  it('honors SSDB_CONFIG_DIR', () => {
    process.env.SSDB_CONFIG_DIR = '/tmp/ssdb-test-config';
    expect(getConfigDir()).toBe('/tmp/ssdb-test-config');
    expect(getConfigPath()).toBe(path.join('/tmp/ssdb-test-config', 'config.json'));
  });
});
