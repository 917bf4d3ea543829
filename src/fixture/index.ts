export { materializeFixture, resolveFixturePath } from './materialize';
export { nodeFileSystem } from './filesystem';
export type { FixtureFileSystem } from './filesystem';
export { createTempDirAllocator, tempDirAllocator } from './allocator';
export type { FixtureAllocator, TempDirAllocatorOptions } from './allocator';
