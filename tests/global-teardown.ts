/**
 * Vitest Global Teardown
 *
 * Registered through `globalSetup`; Vitest calls the exported `teardown`
 * once every test file has finished. Test cleanup hooks don't execute when
 * processes are killed, so leaked temp dirs are removed here.
 *
 * @module tests/global-teardown
 */

import { readdirSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

/** Prefixes of temp directories created by tests */
export const TEMP_DIR_PREFIXES = ['protocol-store-', 'protocol-export-', 'protocol-tools-', 'protocol-loop-'];

/**
 * Remove every entry of `base` whose name starts with a test prefix.
 * Returns the names removed.
 */
export function removeLeakedTempDirs(base: string): string[] {
  let entries: string[];
  try {
    entries = readdirSync(base);
  } catch (error) {
    console.error(
      `[teardown] Cannot read ${base}: ${error instanceof Error ? error.message : String(error)}`
    );
    return [];
  }

  const removed: string[] = [];
  for (const entry of entries) {
    if (!TEMP_DIR_PREFIXES.some((prefix) => entry.startsWith(prefix))) continue;
    try {
      rmSync(join(base, entry), { recursive: true, force: true });
      removed.push(entry);
    } catch (error) {
      console.error(
        `[teardown] Failed to remove ${entry}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
  return removed;
}

export function teardown(): void {
  removeLeakedTempDirs(tmpdir());
}
