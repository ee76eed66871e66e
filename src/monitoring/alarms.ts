/**
 * CloudWatch Alarms Configuration
 *
 * Alarm definitions over the metrics the service emits through
 * MetricsEmitter. The CDK monitoring stack turns them into CloudWatch alarms.
 */

export const DEFAULT_METRICS_NAMESPACE = 'FeedbackAnalyzer/Backend';

export interface AlarmConfiguration {
  alarmName: string;
  alarmDescription: string;
  metricName: string;
  namespace: string;
  statistic: 'Average' | 'Sum' | 'Minimum' | 'Maximum' | 'SampleCount';
  period: number; // in seconds
  evaluationPeriods: number;
  threshold: number;
  comparisonOperator:
    | 'GreaterThanThreshold'
    | 'GreaterThanOrEqualToThreshold'
    | 'LessThanThreshold'
    | 'LessThanOrEqualToThreshold';
  treatMissingData?: 'breaching' | 'notBreaching' | 'ignore' | 'missing';
  dimensions?: Record<string, string>;
}

/**
 * High Error Rate Alarm (> 5 errors in 5 minutes)
 */
export function highErrorRateAlarm(namespace: string = DEFAULT_METRICS_NAMESPACE): AlarmConfiguration {
  return {
    alarmName: 'FeedbackAnalyzer-High-Error-Rate',
    alarmDescription: 'More than 5 errors in 5 minutes',
    metricName: 'ErrorRate',
    namespace,
    statistic: 'Sum',
    period: 300, // 5 minutes
    evaluationPeriods: 1,
    threshold: 5,
    comparisonOperator: 'GreaterThanThreshold',
    treatMissingData: 'notBreaching',
  };
}

/**
 * Bedrock High Latency Alarm (> 15s)
 *
 * A full analysis call normally takes a few seconds.
 */
export function bedrockHighLatencyAlarm(
  namespace: string = DEFAULT_METRICS_NAMESPACE
): AlarmConfiguration {
  return {
    alarmName: 'FeedbackAnalyzer-Bedrock-High-Latency',
    alarmDescription: 'Bedrock latency exceeds 15s - Bedrock service issue',
    metricName: 'BedrockLatency',
    namespace,
    statistic: 'Average',
    period: 300,
    evaluationPeriods: 2,
    threshold: 15000, // 15s
    comparisonOperator: 'GreaterThanThreshold',
    treatMissingData: 'notBreaching',
  };
}

/**
 * Database High Latency Alarm (> 100ms)
 */
export function databaseHighLatencyAlarm(
  namespace: string = DEFAULT_METRICS_NAMESPACE
): AlarmConfiguration {
  return {
    alarmName: 'FeedbackAnalyzer-Database-High-Latency',
    alarmDescription: 'Database latency exceeds 100ms - Database performance issue',
    metricName: 'DatabaseLatency',
    namespace,
    statistic: 'Average',
    period: 300,
    evaluationPeriods: 2,
    threshold: 100, // 100ms
    comparisonOperator: 'GreaterThanThreshold',
    treatMissingData: 'notBreaching',
  };
}

export function getAllAlarms(namespace: string = DEFAULT_METRICS_NAMESPACE): AlarmConfiguration[] {
  return [
    highErrorRateAlarm(namespace),
    bedrockHighLatencyAlarm(namespace),
    databaseHighLatencyAlarm(namespace),
  ];
}

/**
 * Get alarm configuration by name
 */
export function getAlarmConfiguration(
  alarmName: string,
  namespace: string = DEFAULT_METRICS_NAMESPACE
): AlarmConfiguration | undefined {
  return getAllAlarms(namespace).find((alarm) => alarm.alarmName === alarmName);
}
