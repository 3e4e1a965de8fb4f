export { loadConfig, ConfigError } from './config';
export type { EngineConfig, CoordinatorConfig, RetryPolicy, PersistenceMode, ArtifactDeleteMode } from './config';
export { createPool } from './db';
export { migrate } from './db/schema';
export { runStatus, TERMINAL_RUN_STATUSES } from './db/workflow_run.entity';
export type { WorkflowRunEntity } from './db/workflow_run.entity';
export { stepStatus } from './db/step_record.entity';
export type { StepRecordEntity } from './db/step_record.entity';
export type { CompensationLogEntity } from './db/compensation_log.entity';
export { EventBus } from './events/event-bus';
export type { SagaEvents, SagaEventName, SagaEventHandler, StepEvent } from './events/event-bus';
export { attachAuditLog, EventRecorder } from './events/audit-log';
export { SagaCoordinator } from './services/saga-coordinator';
export type { SagaCoordinatorDeps } from './services/saga-coordinator';
export { IntegrityChecker } from './services/integrity-checker';
export * from './persistence';
export * from './modules';
export { contentPipeline, CONTENT_PIPELINE } from './workflows';
export type { PipelineStepOptions } from './workflows';
export { createRuntime } from './runtime';
export type { Runtime, RuntimeOptions } from './runtime';
