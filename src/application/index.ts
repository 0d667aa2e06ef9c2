export { CollectionOrchestrator } from './collection-orchestrator.js';
export type { CollectionOrchestratorOptions } from './collection-orchestrator.js';
export { CollectionState } from './collection-state.js';
export type { CollectionStateSnapshot } from './collection-state.js';
export { PollingScheduler } from './polling-scheduler.js';
export type { PollingSchedulerOptions, SchedulerState } from './polling-scheduler.js';
export { metricRecordSchema, validateMetricRecord } from './metric-schema.js';
export type { CollectorLogger } from './logger.js';
export { classifyOutcome, toCollectionReport } from './collection-report.js';
export type { CollectionReport, CollectionStatus } from './collection-report.js';
