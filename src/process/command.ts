import type { CommandDescriptor, CommandOption } from '../types/execution';
import type { TestPlan } from '../types/plan';

type AmbientEnvironment = Readonly<Record<string, string | undefined>>;

/**
 * Copies the defined entries of an environment such as `process.env`.
 */
export function snapshotEnvironment(
  ambient: AmbientEnvironment
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(ambient)) {
    if (value !== undefined) env[key] = value;
  }
  return env;
}

/**
 * Builds the descriptor for one invocation: the plan's arguments and stdin,
 * the fixture root as working directory, and a copy of the ambient
 * environment.
 *
 * The plan's own `env` entries are NOT applied here; see
 * `applyEnvironmentOverlay`, which runs after the command options.
 */
export function createCommandDescriptor(
  program: string,
  plan: TestPlan,
  ambientEnv: AmbientEnvironment = process.env
): CommandDescriptor {
  return {
    program,
    args: [...plan.args],
    cwd: plan.rootDir,
    env: snapshotEnvironment(ambientEnv),
    stdin: plan.stdin
  };
}

/**
 * Overlays `KEY=VALUE` entries onto the descriptor's environment.
 *
 * Each entry is split at its first `=`, so values may contain `=`. Entries
 * are applied in order; a later entry for the same key wins.
 */
export function applyEnvironmentOverlay(
  command: CommandDescriptor,
  entries: readonly string[]
): void {
  for (const entry of entries) {
    const separator = entry.indexOf('=');
    if (separator === -1) continue;
    command.env[entry.slice(0, separator)] = entry.slice(separator + 1);
  }
}

/**
 * Applies the caller's command options in order, then the plan environment.
 *
 * Options see the descriptor as built from the plan and may replace any of
 * it (including the whole environment); scheme `--env:` entries are layered
 * on top of whatever environment the options leave behind.
 */
export function prepareCommand(
  program: string,
  plan: TestPlan,
  options: readonly CommandOption[],
  ambientEnv: AmbientEnvironment = process.env
): CommandDescriptor {
  const command = createCommandDescriptor(program, plan, ambientEnv);
  for (const option of options) option(command);
  applyEnvironmentOverlay(command, plan.env);
  return command;
}

/**
 * Sets (or overrides) environment variables of the child.
 */
export function withEnv(variables: Readonly<Record<string, string>>): CommandOption {
  return command => {
    Object.assign(command.env, variables);
  };
}

/**
 * Runs the child in `cwd` instead of the fixture root.
 */
export function withCwd(cwd: string): CommandOption {
  return command => {
    command.cwd = cwd;
  };
}

/**
 * Appends arguments after the ones declared in the scheme.
 */
export function withArgs(...args: string[]): CommandOption {
  return command => {
    command.args.push(...args);
  };
}
