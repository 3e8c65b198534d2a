/**
 * @reelport/core
 *
 * Job orchestration layer containing:
 * - Error taxonomy
 * - Job state machine
 * - Job registry and scheduler (admission, FIFO queue, single worker)
 * - Job runner (resolve, fetch, split, assets, deliver)
 * - Status sink (coalescing channel + throttle)
 * - Collaborator interfaces and in-memory stores
 */

// Errors
export {
  ReelportError,
  ResolutionFailureError,
  FetchFailureError,
  ProcessingFailureError,
  DeliverySizeExceededError,
  DeliveryRateLimitedError,
  AdmissionConflictError,
  NoActiveJobError,
  JobCancelledError,
  StateTransitionError,
} from './errors/index.js';

// State machine
export {
  JobStateMachine,
  JOB_STATES,
  TERMINAL_STATES,
  isValidTransition,
  getNextStates,
  isTerminalState,
  type JobState,
  type JobStateTransition,
} from './stateMachine.js';

// Types
export { createJob, jobStatus, type Job, type JobRequest } from './types/job.js';
export { DEFAULT_PREFERENCES, defaultPreferences, type UserPreferences } from './types/preferences.js';
export type {
  FetchTool,
  Segmenter,
  AssetProducer,
  MediaProbe,
  DeliveryKind,
  DeliveryItem,
  DeliveryChannel,
  StatusReporter,
  PreferenceStore,
  EphemeralStore,
} from './types/collaborators.js';

// Scheduling
export { JobRegistry, type RegistryAdmission } from './registry.js';
export {
  JobScheduler,
  type JobExecutor,
  type AdmissionResult,
  type CancelResult,
} from './scheduler.js';
export {
  JobRunner,
  partCaption,
  DEFAULT_RUNNER_CONFIG,
  type JobRunnerConfig,
  type JobRunnerDeps,
} from './jobRunner.js';

// Status
export { CoalescingChannel } from './status/channel.js';
export { ProgressThrottle, DEFAULT_STEP_PERCENT, DEFAULT_INTERVAL_MS } from './status/throttle.js';
export { StatusSink, type StatusMessage, type StatusSinkOptions } from './status/sink.js';
export {
  STATUS_TEXT,
  formatBytes,
  formatProgressText,
  formatProgressAlert,
  uploadSnapshot,
  uploadingTitle,
  completedText,
  failedText,
} from './status/format.js';

// Stores
export { MemoryPreferenceStore, MemoryEphemeralStore } from './stores/memory.js';
