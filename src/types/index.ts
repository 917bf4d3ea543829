export type {
  BlockState,
  InterpretOptions,
  InterpretResult,
  TestPlan
} from './plan';
export type {
  CommandDescriptor,
  CommandOption,
  ExecutionResult
} from './execution';
export type {
  Diagnostic,
  DiagnosticLevel,
  TestHandle,
  TestOutcome
} from './handle';
