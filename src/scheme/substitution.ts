import { ROOT_DIR_PLACEHOLDER } from '../constants';

/**
 * Expands the placeholder vocabulary of the scheme language.
 *
 * Currently a single symbol: `{dir}` becomes the absolute fixture root.
 * Every literal occurrence is replaced; the result is not rescanned, so a
 * root path containing `{dir}` is inserted as is.
 */
export function substituteVariables(text: string, rootDir: string): string {
  return text.split(ROOT_DIR_PLACEHOLDER).join(rootDir);
}
