/**
 * Main entry point - exports all public APIs
 */

export { loadConfig, buildConfig, PipelineConfig, PipelineConfigInput, CostConfig, BandThresholds } from './config';
export { createLogger, Logger, LogContext, LogLevel } from './logger';
export {
    PipelineError,
    TransientFetchError,
    ComputeError,
    ComputeTimeoutError,
    BudgetExceededError,
    DispatchError,
    SchemaMismatchError,
    StateTransitionError,
    ExecutionLockedError,
    ConfigError,
    InvalidRequestError,
    NotFoundError,
    ErrorCode,
    FailureDescription,
    describeFailure,
    isFatal
} from './structured_error';
export { openPipelineDatabase, PipelineDatabase, SCHEMA_VERSION } from './pipeline_store';
export { ReportCache, CacheEntry, CacheLookup, CacheStatus, MissReason, PutEntryParams } from './report_cache';
export {
    JobStateStore,
    JobState,
    JobRecord,
    JobAttempt,
    JobCounts,
    JobStatusUpdate,
    ExecutionRecord
} from './job_state_store';
export { ExecutionLock, LockHolder, lockKeyForDate } from './execution_lock';
export { CostGate, CostBand, CostScore, CostBreakdown, ResourceUsage, SpendRecord, COST_BANDS } from './cost_gate';
export { RetryPolicy, RetryDecision, RetrySettings, RETRYABLE_CODES } from './retry_policy';
export {
    InMemoryWorkQueue,
    WorkQueue,
    WorkMessage,
    ComputeMessage,
    InvalidateMessage,
    QueueDelivery,
    DeadLetter,
    computeMessage,
    invalidateMessage,
    encodeWorkMessage,
    decodeWorkMessage,
    WORK_MESSAGE_VERSION
} from './work_queue';
export { ReportWorker, ReportBuilder, BuildContext, UsageTracker, WorkOutcome } from './worker';
export { WorkerPool, Redispatcher } from './worker_pool';
export { Orchestrator, StartRequest, StartResult, RetryFailedResult, RecoveryResult, formatAsOfDate } from './orchestrator';
export { CompletionWatcher, ExecutionSummary, WatchState } from './completion_watcher';
export { InstrumentRegistry, Instrument, Resolution, AUTO_CORRECT_AT, SUGGEST_AT } from './instrument_registry';
export { similarityRatio } from './similarity';
export { withTimeout, sleep, AbortedError } from './timeout';
export { createPipeline, Pipeline, PipelineOverrides } from './pipeline';
