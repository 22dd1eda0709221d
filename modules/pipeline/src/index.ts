export {
  collect,
  previewForUser,
  roomSurfaceFactory,
  stageForUser,
  type CollectDeps,
  type CollectOptions,
  type CollectResult,
  type StageDeps,
  type StageResult,
  type SurfaceFactory,
  type SurfaceSession,
} from './pipeline.js';
export { run, type CliContext, type CliResult } from './cli.js';
