// Public API

export {
  CHECKPOINT_MODES,
  defaultConfig,
  loadConfig,
  resolveConfig,
  type AppConfig,
  type CheckpointMode,
  type ConfigOverrides,
} from './config';
export {
  AppError,
  HardLimitError,
  RetriableError,
  getErrorMessage,
  isCancellationError,
  isHardLimitError,
  isRetriableError,
  type ErrorCode,
} from './errors';
export type {
  ChunkInput,
  CheckpointReason,
  CheckpointRequest,
  Manifest,
  WorkerAssignment,
  WorkerProgress,
  WorkerReport,
  WorkerState,
  WorkUnit,
} from './state/types';
export type {
  IAudioSink,
  ICheckpointHandler,
  ILogger,
  IManifestWriter,
  ITTSSession,
  ITTSSessionFactory,
  SendRequest,
} from './services/interfaces';

export { createWorkUnits, outputKeyFor, sanitizeGroupName } from './services/WorkUnits';
export { describeDistribution, distributeRoundRobin } from './services/ChunkDistributor';
export { SessionBudget } from './services/SessionBudget';
export { ManifestStore, MANIFEST_FILENAME } from './services/ManifestStore';
export { WorkerSession, type WorkerResult, type WorkerSessionOptions } from './services/WorkerSession';
export {
  ParallelCoordinator,
  computeOptimalWorkers,
  type CoordinatorDeps,
  type CoordinatorRunOptions,
  type RunSummary,
  type WorkerCount,
} from './services/ParallelCoordinator';
export { SafetyProbe, type SafetyProbeResult } from './services/SafetyProbe';
export { ResumePlanner, computeResumePlan, type ResumePlan, type ResumeSource } from './services/ResumePlanner';
export { FileAudioSink } from './services/FileAudioSink';
export { ConsoleCheckpointPrompt, formatCheckpointPrompt } from './services/ConsoleCheckpointPrompt';
export { DashboardWriter, formatEta, renderDashboard } from './services/DashboardRenderer';
export { ProgressStore, type ProgressSnapshot, type ProgressTotals } from './stores/ProgressStore';
export {
  ConversionRunner,
  formatIndexList,
  formatRunReport,
  type ConversionRunOptions,
  type ConversionRunnerDeps,
  type RunReport,
  type RunStatus,
} from './services/ConversionRunner';
export { Logger, LoggerStore, createLogger, createLoggerStore } from './services/Logger';
export { createConversionRunner, getLogger, getLoggerStore, resetLogger } from './services/index';
