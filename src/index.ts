export * from './errors/CustomError';
export * from './parsers/units';
export * from './parsers/poolIostatParser';
export * from './parsers/arcstatParser';
export * from './analytics/phase';
export * from './analytics/statistics';
export * from './analytics/latencyScaler';
export * from './analytics/anomalies';
export * from './analytics/scaling';
export * from './analytics/segments';
export * from './analytics/ioSize';
export * from './analytics/runSummary';
export * from './services/TelemetryCollector';
export * from './services/PoolIostatCollector';
export * from './services/ArcstatCollector';
export * from './services/topology';
export { analyzeRecording, buildAnalytics, parseSegmentSchedule, recordRun } from './scripts/recordRun';
export type { RecordOptions, RecordResult, RecordingAnalytics, SegmentStep } from './scripts/recordRun';
