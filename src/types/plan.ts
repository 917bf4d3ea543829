/**
 * The fully parsed, substitution-resolved description of one invocation.
 *
 * Role: Interpreter output.
 * Built fresh for every test invocation and never mutated afterwards; the
 * materializer, the execution engine and the assertion engine each read the
 * part they need.
 */
export type TestPlan = {
  /**
   * Absolute path of the exclusive fixture directory. Allocated before
   * parsing so that `{dir}` can be expanded while reading directives.
   */
  readonly rootDir: string;

  /**
   * Normalized relative path (may contain directory separators) → exact
   * content. Insertion order follows the last declaration of each path.
   */
  readonly files: ReadonlyMap<string, string>;

  /**
   * Arguments passed to the program, without the program name.
   */
  readonly args: readonly string[];

  /**
   * `KEY=VALUE` entries overlaid onto the inherited environment, in
   * declaration order (later entries win on key collision).
   */
  readonly env: readonly string[];

  /**
   * Bytes fed to the child's standard input, verbatim.
   */
  readonly stdin: string;

  readonly stdoutExpected: string;
  readonly stderrExpected: string;

  /**
   * Expected exit status; `0` unless the scheme declares `--return-code:`.
   */
  readonly returnCodeExpected: number;
};

/**
 * Interpreter state.
 *
 * A single tagged value instead of independent mode flags, so that two
 * blocks can never be open at the same time. Only the `file` state carries
 * data: the pending file name and the lines accumulated for it.
 */
export type BlockState =
  | { kind: 'none' }
  | { kind: 'stdout' }
  | { kind: 'stderr' }
  | { kind: 'stdin' }
  | { kind: 'file'; name: string; lines: string[] };

/**
 * Result of interpreting one scheme.
 */
export type InterpretResult = {
  plan: TestPlan;

  /**
   * Non-fatal notices (strict mode only), in line order.
   */
  warnings: string[];
};

export type InterpretOptions = {
  /**
   * See `HarnessConfig.strict`.
   */
  strict?: boolean;

  /**
   * See `HarnessConfig.maxLineBytes`.
   */
  maxLineBytes?: number;
};
