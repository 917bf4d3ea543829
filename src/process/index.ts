export { runCommand } from './engine';
export {
  applyEnvironmentOverlay,
  createCommandDescriptor,
  prepareCommand,
  snapshotEnvironment,
  withArgs,
  withCwd,
  withEnv
} from './command';
export { nodeProcessSpawner } from './spawner';
export type { ProcessSpawner, SpawnRequest, SpawnedProcess } from './spawner';
