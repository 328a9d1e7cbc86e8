/**
 * Runner Module
 *
 * Run-once orchestration: locking, target resolution, the run log.
 */

export * from './types.js';

export {
  RunCoordinator,
  type CoordinatorDependencies,
  type CoordinatorOptions,
  type CredentialGate,
  type ItemPipeline,
} from './coordinator.js';

export { FileRunLock, type RunLock, type LockHandle, type FileRunLockConfig } from './lock.js';

export { FileRunLog, formatRunLogLine, type RunLog } from './runLog.js';
