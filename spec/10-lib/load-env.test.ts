import { describe, test, expect, vi } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadEnv, parseEnv } from '@lib/env/load-env.js';

function restoreEnv(key: string, value: string | undefined): void {
  if (value === undefined) {
    delete process.env[key];
  } else {
    process.env[key] = value;
  }
}

describe('parseEnv', () => {
  test('should skip comments, blank lines and malformed entries', () => {
    const content = ['# settings', '', 'PORT=9100', 'not-an-entry', '=missing-key'].join('\n');

    expect(parseEnv(content)).toEqual([['PORT', '9100']]);
  });

  test('should unquote values and strip inline comments from unquoted ones', () => {
    const content = ['A="quoted # kept"', "B='single'", 'C=plain # dropped', 'D = spaced '].join('\r\n');

    expect(parseEnv(content)).toEqual([
      ['A', 'quoted # kept'],
      ['B', 'single'],
      ['C', 'plain'],
      ['D', 'spaced'],
    ]);
  });
});

describe('loadEnv', () => {
  test('should load nothing when the file is absent', () => {
    const env: NodeJS.ProcessEnv = {};

    expect(loadEnv({ path: '/nonexistent/.env.missing', env })).toBe(0);
    expect(env).toEqual({});
  });

  test('should merge the environment file before the logger module is evaluated', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'crud-env-'));
    writeFileSync(join(dir, '.env.preload_check'), 'CRUD_DEBUG_MODE=true\n');

    const cwd = process.cwd();
    const nodeEnv = process.env.NODE_ENV;
    const debugMode = process.env.CRUD_DEBUG_MODE;

    delete process.env.CRUD_DEBUG_MODE;
    process.env.NODE_ENV = 'preload_check';
    process.chdir(dir);

    try {
      vi.resetModules();
      await import('@lib/env/preload.js');
      const { logger } = await import('@lib/logger.js');

      expect(logger.isDebugEnabled()).toBe(true);
    } finally {
      process.chdir(cwd);
      restoreEnv('NODE_ENV', nodeEnv);
      restoreEnv('CRUD_DEBUG_MODE', debugMode);
      vi.resetModules();
    }
  });
});
