/**
 * Session module.
 *
 * Durable checkpoint, filesystem state detection and the session-level operations
 * built on them.
 *
 * @packageDocumentation
 */

export type { Checkpoint, CheckpointErrorType } from './checkpoint.js';

export {
  CheckpointError,
  checkpointPath,
  serializeCheckpoint,
  deserializeCheckpoint,
  checkpointExists,
  loadCheckpoint,
  saveCheckpoint,
  computeFileHash,
  createCheckpoint,
  fileChangedSinceCheckpoint,
} from './checkpoint.js';

export type { WorkflowStep, ResumeStep, DetectedState } from './detector.js';

export {
  WORKFLOW_STEPS,
  RESUMABLE_STEPS,
  SPLIT_DIR_PATTERN,
  isValidSplitDir,
  getSplitIndex,
  listSplitDirs,
  detectState,
} from './detector.js';

export type {
  SetupOptions,
  SetupDeps,
  SetupFailureCategory,
  SetupFailure,
  SetupSuccess,
  SetupResult,
} from './setup.js';

export { setupSession, validateInputFile } from './setup.js';

export type { SplitDirsSuccess, SplitDirsFailure, SplitDirsResult } from './split-dirs.js';

export { createSplitDirectories, validatePlanningDir } from './split-dirs.js';

export type { HookOutput, CaptureResult } from './capture.js';

export { SESSION_ID_VAR, TRANSCRIPT_PATH_VAR, captureSession } from './capture.js';
