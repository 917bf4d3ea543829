import { dirname, isAbsolute, relative, resolve, sep } from 'node:path';

import type { FixtureFileSystem } from './filesystem';

import { FixtureError, describeCause } from '../errors';
import { fixtureLogger as logger } from '../logger';
import { nodeFileSystem } from './filesystem';

/**
 * Resolves a declared file path against the fixture root.
 *
 * @throws FixtureError (`FIXTURE_PATH_OUTSIDE_ROOT`) for absolute paths and
 *   for relative paths that climb out of the root.
 */
export function resolveFixturePath(rootDir: string, filePath: string): string {
  const target = resolve(rootDir, filePath);
  const fromRoot = relative(rootDir, target);

  if (
    isAbsolute(filePath) ||
    fromRoot === '' ||
    fromRoot === '..' ||
    fromRoot.startsWith(`..${sep}`) ||
    isAbsolute(fromRoot)
  ) {
    throw new FixtureError(
      `Fixture file ${JSON.stringify(filePath)} resolves outside the fixture root`,
      'FIXTURE_PATH_OUTSIDE_ROOT',
      { rootDir, filePath }
    );
  }

  return target;
}

/**
 * Writes every declared file under the fixture root.
 *
 * Logic:
 * 1. Resolve:
 *    Each relative path is resolved against `rootDir` and must stay inside it.
 * 2. Directories:
 *    The parent directory is ensured before writing. Ensuring is idempotent,
 *    so files sharing a subdirectory do not conflict.
 * 3. Content:
 *    The content is written verbatim as UTF-8.
 *
 * Files are written one after another in declaration order; the first
 * failure aborts the whole fixture.
 *
 * @param rootDir - Freshly allocated, empty, exclusive directory.
 * @param files - Relative path → content, as produced by the interpreter.
 * @param fileSystem - Filesystem to write to.
 * @throws FixtureError on an invalid path or a failed directory/file write.
 */
export async function materializeFixture(
  rootDir: string,
  files: ReadonlyMap<string, string>,
  fileSystem: FixtureFileSystem = nodeFileSystem
): Promise<void> {
  for (const [filePath, content] of files) {
    const target = resolveFixturePath(rootDir, filePath);
    const parent = dirname(target);

    try {
      await fileSystem.ensureDir(parent);
    } catch (error) {
      throw new FixtureError(
        `Failed to create directory (${JSON.stringify(parent)}) for test file: ${describeCause(error)}`,
        'FIXTURE_DIRECTORY_FAILED',
        { directory: parent, filePath },
        error
      );
    }

    try {
      await fileSystem.writeFile(target, content);
    } catch (error) {
      throw new FixtureError(
        `Failed to write file (${target}): ${describeCause(error)}`,
        'FIXTURE_WRITE_FAILED',
        { path: target, filePath },
        error
      );
    }
  }

  logger.debug('Materialized fixture', { rootDir, files: files.size });
}
