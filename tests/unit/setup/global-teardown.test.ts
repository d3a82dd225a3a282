/**
 * Unit tests for the temp-directory teardown and its registration
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import config from '../../../vitest.config.js';
import { removeLeakedTempDirs } from '../../global-teardown.js';

describe('removeLeakedTempDirs', () => {
  let base: string;

  beforeEach(() => {
    base = mkdtempSync(join(tmpdir(), 'teardown-base-'));
  });

  afterEach(() => {
    rmSync(base, { recursive: true, force: true });
  });

  it('removes only directories with a test prefix', () => {
    mkdirSync(join(base, 'protocol-store-abc'));
    writeFileSync(join(base, 'protocol-store-abc', 'jobs.db'), '');
    mkdirSync(join(base, 'protocol-loop-xyz'));
    mkdirSync(join(base, 'unrelated-dir'));

    const removed = removeLeakedTempDirs(base);

    expect(removed.sort()).toEqual(['protocol-loop-xyz', 'protocol-store-abc']);
    expect(existsSync(join(base, 'protocol-store-abc'))).toBe(false);
    expect(existsSync(join(base, 'unrelated-dir'))).toBe(true);
  });

  it('returns nothing for a missing base directory', () => {
    expect(removeLeakedTempDirs(join(base, 'missing'))).toEqual([]);
  });
});

describe('vitest configuration', () => {
  it('registers the teardown module as global setup', () => {
    expect(config.test?.globalSetup).toEqual(['./tests/global-teardown.ts']);
  });
});
