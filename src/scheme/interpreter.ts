import { posix } from 'node:path';

import type {
  BlockState,
  InterpretOptions,
  InterpretResult
} from '../types/plan';
import type { Directive } from './directives';

import { DEFAULT_RETURN_CODE } from '../constants';
import { SchemeSyntaxError } from '../errors';
import { interpreterLogger as logger } from '../logger';
import { recognizeDirective } from './directives';
import { toLines } from './segmenter';
import { substituteVariables } from './substitution';

/**
 * Mutable accumulator used while the scheme is being read.
 * Frozen into a `TestPlan` once every line has been consumed.
 */
type PlanDraft = {
  files: Map<string, string>;
  declaredFiles: Set<string>;
  args: string[];
  env: string[];
  stdin: string[];
  stdout: string[];
  stderr: string[];
  returnCode: number;
  returnCodeLine: number | undefined;
  warnings: string[];
};

type DirectiveContext = {
  rootDir: string;
  strict: boolean;
  lineNumber: number;
};

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parses a `--return-code:` argument as a base-10 integer.
 *
 * Accepts an optional sign and leading zeros; rejects empty input,
 * fractions, exponents and values outside the safe integer range.
 */
function parseReturnCode(raw: string, lineNumber: number): number {
  const text = raw.trim();
  const value = INTEGER_PATTERN.test(text) ? Number(text) : Number.NaN;

  if (!Number.isSafeInteger(value)) {
    throw new SchemeSyntaxError(
      `Failed to convert return code ${JSON.stringify(text)} to int (line ${lineNumber})`,
      'INVALID_RETURN_CODE',
      { line: lineNumber, value: text }
    );
  }

  return value;
}

/**
 * Map key for a `--file:` name, so that `a.txt`, `./a.txt` and
 * `sub/../a.txt` name one entry. Leading `..` segments and absolute paths
 * survive; the materializer rejects them.
 */
function fileKey(name: string): string {
  return posix.normalize(name);
}

/**
 * Moves the content of an open file block into the file map.
 * No-op for every other state.
 *
 * The previous entry for the same path is removed first, so the map is
 * ordered by last declaration.
 */
function flushFile(state: BlockState, draft: PlanDraft): void {
  if (state.kind !== 'file') return;
  draft.files.delete(state.name);
  draft.files.set(state.name, state.lines.join(''));
}

/**
 * Applies one directive and returns the next interpreter state.
 *
 * Block directives close (and flush) any open file block before switching.
 * Scalar directives (`return-code`, `arg`, `env`, `unknown`) record their
 * value and leave the current block open, so payload lines that follow keep
 * flowing into it.
 */
function applyDirective(
  directive: Directive,
  state: BlockState,
  draft: PlanDraft,
  context: DirectiveContext
): BlockState {
  const { rootDir, strict, lineNumber } = context;

  switch (directive.kind) {
    case 'open-block':
      flushFile(state, draft);
      return { kind: directive.block };

    case 'open-file': {
      flushFile(state, draft);

      const written = directive.name.trim();
      if (written === '') {
        throw new SchemeSyntaxError(
          `Missing file name in --file: directive (line ${lineNumber})`,
          'MISSING_FILE_NAME',
          { line: lineNumber }
        );
      }
      const name = fileKey(written);
      if (strict && draft.declaredFiles.has(name)) {
        throw new SchemeSyntaxError(
          `File ${JSON.stringify(written)} is declared more than once (line ${lineNumber})`,
          'DUPLICATE_FILE',
          { line: lineNumber, name }
        );
      }
      draft.declaredFiles.add(name);

      return { kind: 'file', name, lines: [] };
    }

    case 'return-code': {
      if (strict && draft.returnCodeLine !== undefined) {
        throw new SchemeSyntaxError(
          `Return code is declared more than once (lines ${draft.returnCodeLine} and ${lineNumber})`,
          'DUPLICATE_RETURN_CODE',
          { line: lineNumber, firstLine: draft.returnCodeLine }
        );
      }
      draft.returnCode = parseReturnCode(directive.value, lineNumber);
      draft.returnCodeLine = lineNumber;
      return state;
    }

    case 'arg':
      draft.args.push(substituteVariables(directive.value.trim(), rootDir));
      return state;

    case 'env': {
      const entry = substituteVariables(directive.value.trim(), rootDir);
      if (!entry.includes('=')) {
        throw new SchemeSyntaxError(
          `Malformed --env entry ${JSON.stringify(entry)}, expected KEY=VALUE (line ${lineNumber})`,
          'INVALID_ENV_ENTRY',
          { line: lineNumber, entry }
        );
      }
      draft.env.push(entry);
      return state;
    }

    case 'unknown':
      if (strict) {
        draft.warnings.push(
          `Ignoring unknown directive ${JSON.stringify(directive.text)} (line ${lineNumber})`
        );
      }
      logger.debug('Ignoring unknown directive', {
        directive: directive.text,
        line: lineNumber
      });
      return state;
  }
}

/**
 * Routes a payload line to the buffer of the open block.
 *
 * Substitution applies to file content and output expectations; stdin is
 * copied verbatim. Lines outside any block are discarded.
 */
function appendPayload(
  line: string,
  state: BlockState,
  draft: PlanDraft,
  rootDir: string
): void {
  switch (state.kind) {
    case 'stderr':
      draft.stderr.push(substituteVariables(line, rootDir));
      return;
    case 'stdout':
      draft.stdout.push(substituteVariables(line, rootDir));
      return;
    case 'file':
      state.lines.push(substituteVariables(line, rootDir));
      return;
    case 'stdin':
      draft.stdin.push(line);
      return;
    case 'none':
      return;
  }
}

/**
 * Interprets a scheme into a test plan.
 *
 * Pipeline overview
 * -----------------
 * 1. Segment
 *    The scheme is split into newline-terminated lines (see `toLines`).
 *
 * 2. Classify
 *    Each line is matched against the directive recognizers, in priority
 *    order. A directive is never payload, even inside an open block.
 *
 * 3. Dispatch
 *    - Directive: transition the single block state, or record a scalar.
 *    - Payload: append to the open block (or drop it when none is open).
 *
 * 4. Finish
 *    A file block still open at end of input is flushed; no directive
 *    terminates a trailing file block otherwise.
 *
 * The fixture root must be known before parsing, because `{dir}` is
 * expanded while directives are read.
 *
 * @param scheme - Raw scheme text.
 * @param rootDir - Absolute fixture root used for `{dir}`.
 * @param options - Strictness and line-size ceiling.
 * @returns The plan, plus warnings collected in strict mode.
 * @throws SchemeSyntaxError on a malformed directive. Nothing has been
 *   written or spawned at that point.
 */
export function interpretScheme(
  scheme: string,
  rootDir: string,
  options: InterpretOptions = {}
): InterpretResult {
  const strict = options.strict ?? false;
  const lines = toLines(scheme, { maxLineBytes: options.maxLineBytes });

  const draft: PlanDraft = {
    files: new Map(),
    declaredFiles: new Set(),
    args: [],
    env: [],
    stdin: [],
    stdout: [],
    stderr: [],
    returnCode: DEFAULT_RETURN_CODE,
    returnCodeLine: undefined,
    warnings: []
  };

  let state: BlockState = { kind: 'none' };

  for (const [index, line] of lines.entries()) {
    const directive = recognizeDirective(line);
    if (directive) {
      state = applyDirective(directive, state, draft, {
        rootDir,
        strict,
        lineNumber: index + 1
      });
      continue;
    }
    appendPayload(line, state, draft, rootDir);
  }

  flushFile(state, draft);

  logger.debug('Interpreted scheme', {
    lines: lines.length,
    files: draft.files.size,
    args: draft.args.length,
    env: draft.env.length
  });

  return {
    plan: {
      rootDir,
      files: draft.files,
      args: draft.args,
      env: draft.env,
      stdin: draft.stdin.join(''),
      stdoutExpected: draft.stdout.join(''),
      stderrExpected: draft.stderr.join(''),
      returnCodeExpected: draft.returnCode
    },
    warnings: draft.warnings
  };
}
