import {
  CloudWatchClient,
  PutMetricDataCommand,
  MetricDatum,
  StandardUnit,
} from '@aws-sdk/client-cloudwatch';
import { getLogger } from './logger';

const logger = getLogger();

export interface MetricData {
  metricName: string;
  value: number;
  unit: StandardUnit;
  dimensions?: Record<string, string>;
  timestamp?: Date;
}

export class MetricsEmitter {
  private cloudWatchClient: CloudWatchClient;
  private namespace: string;
  private enabled: boolean;

  constructor(
    region: string,
    namespace: string = 'FeedbackAnalyzer/Backend',
    enabled: boolean = true,
    cloudWatchClient?: CloudWatchClient
  ) {
    this.cloudWatchClient = cloudWatchClient ?? new CloudWatchClient({ region });
    this.namespace = namespace;
    this.enabled = enabled;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  private toDatum(metric: MetricData): MetricDatum {
    const datum: MetricDatum = {
      MetricName: metric.metricName,
      Value: metric.value,
      Unit: metric.unit,
      Timestamp: metric.timestamp || new Date(),
    };

    if (metric.dimensions) {
      datum.Dimensions = Object.entries(metric.dimensions).map(([name, value]) => ({
        Name: name,
        Value: value,
      }));
    }

    return datum;
  }

  /**
   * Emit metrics to CloudWatch in a single request.
   * Failures are logged and never reach the caller.
   */
  async emitMetrics(metrics: MetricData[]): Promise<void> {
    if (!this.enabled) {
      logger.debug('Metrics disabled, skipping metrics emission', {
        metricNames: metrics.map((metric) => metric.metricName),
      });
      return;
    }

    if (metrics.length === 0) {
      return;
    }

    try {
      await this.cloudWatchClient.send(
        new PutMetricDataCommand({
          Namespace: this.namespace,
          MetricData: metrics.map((metric) => this.toDatum(metric)),
        })
      );

      logger.debug('Metrics emitted successfully', {
        event: 'metrics_emitted',
        count: metrics.length,
      });
    } catch (error) {
      logger.error(
        'Failed to emit metrics',
        {
          event: 'metrics_emission_failed',
          count: metrics.length,
        },
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }

  async emitMetric(metric: MetricData): Promise<void> {
    await this.emitMetrics([metric]);
  }

  /**
   * Count an analysis request, split by whether the cached analysis answered it
   */
  async emitAnalysisRequested(cacheHit: boolean): Promise<void> {
    await this.emitMetric({
      metricName: 'AnalysisRequested',
      value: 1,
      unit: 'Count',
      dimensions: { CacheHit: cacheHit ? 'true' : 'false' },
    });
  }

  async emitBedrockLatency(latencyMs: number, modelId?: string): Promise<void> {
    await this.emitMetric({
      metricName: 'BedrockLatency',
      value: latencyMs,
      unit: 'Milliseconds',
      dimensions: modelId ? { ModelId: modelId } : undefined,
    });
  }

  async emitDatabaseLatency(latencyMs: number, operation?: string, table?: string): Promise<void> {
    const dimensions: Record<string, string> = {};

    if (operation) {
      dimensions.Operation = operation;
    }

    if (table) {
      dimensions.Table = table;
    }

    await this.emitMetric({
      metricName: 'DatabaseLatency',
      value: latencyMs,
      unit: 'Milliseconds',
      dimensions: Object.keys(dimensions).length > 0 ? dimensions : undefined,
    });
  }

  async emitError(errorCode?: string): Promise<void> {
    await this.emitMetric({
      metricName: 'ErrorRate',
      value: 1,
      unit: 'Count',
      dimensions: errorCode ? { ErrorCode: errorCode } : undefined,
    });
  }

  destroy(): void {
    this.cloudWatchClient.destroy();
  }
}

let metricsEmitterInstance: MetricsEmitter | null = null;

export function createMetricsEmitter(
  region: string,
  namespace?: string,
  enabled?: boolean
): MetricsEmitter {
  if (!metricsEmitterInstance) {
    metricsEmitterInstance = new MetricsEmitter(region, namespace, enabled);
  }
  return metricsEmitterInstance;
}

/**
 * The process-wide emitter, or null before `createMetricsEmitter` ran.
 */
export function getMetricsEmitter(): MetricsEmitter | null {
  return metricsEmitterInstance;
}

export function resetMetricsEmitter(): void {
  if (metricsEmitterInstance) {
    metricsEmitterInstance.destroy();
    metricsEmitterInstance = null;
  }
}

export default MetricsEmitter;
