export { Logger, createLogger, getLogger, isLogLevel } from './logger';
export type { LogLevel, LogData, LogEntry } from './logger';
export { MetricsEmitter, createMetricsEmitter, getMetricsEmitter, resetMetricsEmitter } from './metrics';
export type { MetricData } from './metrics';
export { HealthCheck } from './health';
export type { HealthCheckResult } from './health';
export {
  DEFAULT_METRICS_NAMESPACE,
  getAllAlarms,
  getAlarmConfiguration,
  highErrorRateAlarm,
  bedrockHighLatencyAlarm,
  databaseHighLatencyAlarm,
} from './alarms';
export type { AlarmConfiguration } from './alarms';
