/**
 * Repository module: gateway, low-level operations and the sync protocol.
 *
 * @module git
 */

export {
  checkpointNotFoundError,
  commitFailedError,
  historyFailedError,
  initFailedError,
  mergeAbortFailedError,
  pushFailedError,
  repoAlreadyExistsError,
  repoNotFoundError,
  repoOpenFailedError,
  resetFailedError,
  stageFailedError,
  statusFailedError,
  workDirUnavailableError,
} from "./errors.js";
export { firstLine, formatTimestamp, SHORT_HASH_LENGTH, shortHash } from "./format.js";
export {
  DEFAULT_CHECKPOINT_MESSAGE,
  GitRepositoryGateway,
  type GitRepositoryGatewayOptions,
  isRepositoryMissing,
} from "./gateway.js";
export {
  type CommitEntry,
  GitOperations,
  type TransferResult,
  toWorkingTreeStatus,
  type WorkingTreeStatus,
} from "./operations.js";
export {
  CHECKPOINT_IDENTITY,
  CONFLICT_RESOLVER_IDENTITY,
  formatIdentity,
  getGitConfig,
  getSanitizedEnv,
} from "./safety.js";
export {
  conflictCommitMessage,
  runSync,
  SYNC_MESSAGES,
  type SyncOptions,
  type SyncPort,
} from "./sync.js";
export type {
  Checkpoint,
  CheckpointCreated,
  CommitIdentity,
  RepositoryGateway,
  RepositoryState,
  RepositoryStatus,
  SyncOutcome,
} from "./types.js";
