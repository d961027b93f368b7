import { afterEach, describe, it, expect, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { envFlag, envInt, getEnv, loadDotEnv } from '@utils/env';

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('env helpers', () => {
  it('treats empty values as unset', () => {
    vi.stubEnv('TIMING_TEST_VALUE', '');
    expect(getEnv('TIMING_TEST_VALUE')).toBeNull();
    vi.stubEnv('TIMING_TEST_VALUE', 'x');
    expect(getEnv('TIMING_TEST_VALUE')).toBe('x');
  });

  it('reads flags and integers', () => {
    vi.stubEnv('TIMING_TEST_FLAG', '1');
    vi.stubEnv('TIMING_TEST_INT', '42');
    expect(envFlag('TIMING_TEST_FLAG')).toBe(true);
    expect(envInt('TIMING_TEST_INT', 7)).toBe(42);
    vi.stubEnv('TIMING_TEST_INT', '4k');
    expect(envInt('TIMING_TEST_INT', 7)).toBe(7);
  });

  it('loads a .env file without overriding exported values', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'timing-env-'));
    const file = path.join(dir, '.env');
    fs.writeFileSync(file, [
      '# comment',
      'TIMING_TEST_A=plain',
      'TIMING_TEST_B="quoted value"',
      'TIMING_TEST_C=from-file',
      'not a pair',
      '',
    ].join('\n'));
    delete process.env.TIMING_TEST_A;
    delete process.env.TIMING_TEST_B;
    vi.stubEnv('TIMING_TEST_C', 'exported');
    try {
      expect(loadDotEnv(file)).toBe(2);
      expect(process.env.TIMING_TEST_A).toBe('plain');
      expect(process.env.TIMING_TEST_B).toBe('quoted value');
      expect(process.env.TIMING_TEST_C).toBe('exported');
    } finally {
      delete process.env.TIMING_TEST_A;
      delete process.env.TIMING_TEST_B;
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('returns 0 when there is no file', () => {
    expect(loadDotEnv(path.join(os.tmpdir(), 'timing-env-missing', '.env'))).toBe(0);
  });
});
