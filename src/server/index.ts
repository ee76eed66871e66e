import { createServer, Server } from 'http';
import { loadConfig } from './config';
import { createApp, API_PREFIX } from './app';
import { ShutdownHandler } from './shutdown';
import { createLogger, createMetricsEmitter, HealthCheck } from '../monitoring';
import {
  AnalysisRepository,
  FormRepository,
  initializeDynamoDBClient,
  ResponseRepository,
} from '../data';
import { BedrockFeedbackAnalyzer } from '../nlp';

let shutdownHandler: ShutdownHandler | null = null;

export async function main(): Promise<Server> {
  // Missing credentials or malformed settings stop startup here
  const config = loadConfig();

  const logger = createLogger(config.server.logLevel);

  logger.info('Feedback Analyzer starting...', {
    event: 'server_starting',
  });

  logger.info('Configuration validated successfully', {
    event: 'config_loaded',
    region: config.aws.region,
    port: config.server.port,
    tablePrefix: config.aws.dynamodbTablePrefix,
    modelId: config.bedrock.modelId,
  });

  const dynamoClient = initializeDynamoDBClient({
    region: config.aws.region,
    tablePrefix: config.aws.dynamodbTablePrefix,
    ...(config.aws.dynamodbEndpoint ? { endpoint: config.aws.dynamodbEndpoint } : {}),
  });

  const metricsEmitter = createMetricsEmitter(
    config.aws.region,
    config.monitoring.cloudwatchNamespace,
    config.monitoring.metricsEnabled
  );

  logger.info('Metrics emitter initialized', {
    event: 'metrics_emitter_initialized',
    enabled: config.monitoring.metricsEnabled,
  });

  const analyzer = new BedrockFeedbackAnalyzer({
    region: config.aws.region,
    modelId: config.bedrock.modelId,
    temperature: config.bedrock.temperature,
    maxTokens: config.bedrock.maxTokens,
    requestTimeoutMs: config.bedrock.requestTimeoutMs,
    credentials: config.bedrock.credentials,
  });

  const healthCheck = new HealthCheck();
  healthCheck.registerDynamoDBCheck(dynamoClient);

  const app = createApp({
    forms: new FormRepository(dynamoClient),
    responses: new ResponseRepository(dynamoClient),
    analyses: new AnalysisRepository(dynamoClient),
    analyzer,
    healthCheck,
    logger,
    metricsEmitter,
  });

  const httpServer = createServer(app);

  shutdownHandler = new ShutdownHandler({
    server: httpServer,
    logger,
    healthCheck,
    resources: [dynamoClient, analyzer, metricsEmitter],
  });

  await new Promise<void>((resolve) => {
    httpServer.listen(config.server.port, () => {
      logger.info('Feedback Analyzer started successfully', {
        event: 'server_started',
        port: config.server.port,
        apiPrefix: API_PREFIX,
      });
      resolve();
    });
  });

  return httpServer;
}

async function shutdown(signal: string): Promise<void> {
  const logger = createLogger();
  logger.info(`${signal} received, shutting down gracefully...`, {
    event: 'shutdown_initiated',
    signal,
  });

  try {
    if (shutdownHandler) {
      await shutdownHandler.shutdown();
    }
    logger.info('Graceful shutdown complete', { event: 'shutdown_complete' });
    process.exit(0);
  } catch (error) {
    logger.error(
      'Error during shutdown',
      { event: 'shutdown_error' },
      error instanceof Error ? error : new Error(String(error))
    );
    process.exit(1);
  }
}

if (require.main === module) {
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  main().catch((error: unknown) => {
    console.error('Failed to start server:', error);
    process.exit(1);
  });
}
