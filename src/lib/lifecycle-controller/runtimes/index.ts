export { ProcessRuntime } from './process-runtime';
export type { ProcessRuntimeOptions, KillFunction } from './process-runtime';
export { ContainerRuntime } from './container-runtime';
export type { ContainerRuntimeOptions } from './container-runtime';
export { spawnDetached } from './spawn-detached';
export type { DetachedSpawner, DetachedProcessSpec } from './spawn-detached';
