import fse from 'fs-extra';

/**
 * Filesystem operations the fixture materializer needs.
 * Lets the materializer run against an in-memory volume in tests.
 */
export interface FixtureFileSystem {
  /** Creates a directory and any missing parents; succeeds if it exists. */
  ensureDir(path: string): Promise<void>;

  /** Writes text content (UTF-8) to a file, replacing it if present. */
  writeFile(path: string, content: string): Promise<void>;
}

/**
 * Default implementation backed by fs-extra.
 */
export const nodeFileSystem: FixtureFileSystem = {
  async ensureDir(path) {
    await fse.ensureDir(path);
  },
  async writeFile(path, content) {
    await fse.writeFile(path, content, 'utf8');
  }
};
