import fse from 'fs-extra';
import { mkdtemp, realpath } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { FixtureError } from '../errors';
import { fixtureLogger as logger } from '../logger';

/**
 * Hands out exclusive fixture roots and takes them back.
 */
export interface FixtureAllocator {
  /**
   * Creates a fresh, empty directory and returns its absolute path.
   */
  allocate(): Promise<string>;

  /**
   * Removes a directory previously returned by `allocate`, with its content.
   */
  release(dir: string): Promise<void>;
}

export type TempDirAllocatorOptions = {
  /**
   * Parent directory of every allocated root.
   * @default os.tmpdir()
   */
  parent?: string;

  /**
   * Name prefix; a random suffix is appended by `mkdtemp`.
   * @default 'exec-scheme-'
   */
  prefix?: string;
};

/**
 * Creates an allocator backed by `mkdtemp`.
 *
 * The returned path is resolved through `realpath`, so that `{dir}` matches
 * what the program under test observes as its working directory even when
 * the temp directory sits behind a symlink (e.g. `/var` → `/private/var`).
 */
export function createTempDirAllocator(
  options: TempDirAllocatorOptions = {}
): FixtureAllocator {
  const parent = options.parent ?? tmpdir();
  const prefix = options.prefix ?? 'exec-scheme-';

  return {
    async allocate() {
      try {
        const created = await mkdtemp(join(parent, prefix));
        const dir = await realpath(created);
        logger.debug('Allocated fixture root', { dir });
        return dir;
      } catch (error) {
        throw new FixtureError(
          `Failed to allocate fixture directory under ${parent}`,
          'FIXTURE_ALLOCATION_FAILED',
          { parent },
          error
        );
      }
    },

    async release(dir) {
      await fse.remove(dir);
      logger.debug('Released fixture root', { dir });
    }
  };
}

export const tempDirAllocator = createTempDirAllocator();
