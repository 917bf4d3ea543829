/**
 * Everything needed to start the program under test.
 *
 * Built from the test plan and then handed to every `CommandOption`, which
 * may change any field before the process is started.
 */
export type CommandDescriptor = {
  program: string;
  args: string[];
  cwd: string;
  env: Record<string, string>;
  stdin: string;
};

/**
 * Mutator applied to the command descriptor before the process starts.
 */
export type CommandOption = (command: CommandDescriptor) => void;

/**
 * What a finished process produced.
 *
 * A nonzero `exitCode` is data for the assertion engine, not an error.
 */
export type ExecutionResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
};
