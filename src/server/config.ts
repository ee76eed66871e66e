import * as dotenv from 'dotenv';
import { isLogLevel, LogLevel } from '../monitoring';

// Load environment variables from .env file
dotenv.config();

export interface Config {
  aws: {
    region: string;
    dynamodbTablePrefix: string;
    dynamodbEndpoint?: string;
  };
  bedrock: {
    modelId: string;
    temperature: number;
    maxTokens: number;
    requestTimeoutMs: number;
    credentials: {
      accessKeyId: string;
      secretAccessKey: string;
      sessionToken?: string;
    };
  };
  server: {
    port: number;
    logLevel: LogLevel;
    nodeEnv: string;
  };
  monitoring: {
    metricsEnabled: boolean;
    cloudwatchNamespace: string;
  };
}

function getEnvVar(name: string, required: boolean = true, defaultValue?: string): string {
  const value = process.env[name] || defaultValue;

  if (required && !value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }

  return value || '';
}

function getEnvVarAsInt(name: string, defaultValue: number): number {
  const value = process.env[name];

  if (!value) {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || String(parsed) !== value.trim()) {
    throw new Error(`Environment variable ${name} must be a valid integer, got: ${value}`);
  }

  return parsed;
}

function getEnvVarAsFloat(name: string, defaultValue: number): number {
  const value = process.env[name];

  if (!value) {
    return defaultValue;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Environment variable ${name} must be a valid number, got: ${value}`);
  }

  return parsed;
}

function getEnvVarAsBoolean(name: string, defaultValue: boolean = false): boolean {
  const value = process.env[name];

  if (!value) {
    return defaultValue;
  }

  return value.toLowerCase() === 'true';
}

function getLogLevel(): LogLevel {
  const value = getEnvVar('LOG_LEVEL', false, 'INFO');
  if (!isLogLevel(value)) {
    throw new Error(`Invalid LOG_LEVEL: ${value}. Must be one of: DEBUG, INFO, WARN, ERROR`);
  }
  return value;
}

function validateConfig(config: Config): void {
  if (config.server.port < 1 || config.server.port > 65535) {
    throw new Error(`Invalid PORT: ${config.server.port}. Must be between 1 and 65535.`);
  }

  if (config.bedrock.temperature < 0 || config.bedrock.temperature > 1) {
    throw new Error('BEDROCK_TEMPERATURE must be between 0 and 1');
  }

  if (config.bedrock.maxTokens < 1) {
    throw new Error('BEDROCK_MAX_TOKENS must be at least 1');
  }

  if (config.bedrock.requestTimeoutMs < 0) {
    throw new Error('BEDROCK_TIMEOUT_MS must not be negative');
  }

  if (config.aws.dynamodbEndpoint) {
    try {
      new URL(config.aws.dynamodbEndpoint);
    } catch {
      throw new Error(`Invalid DYNAMODB_ENDPOINT: ${config.aws.dynamodbEndpoint}`);
    }
  }
}

/**
 * Read and validate configuration from the environment.
 * A missing Bedrock credential is fatal here, at startup, rather than on the
 * first analysis request.
 */
export function loadConfig(): Config {
  const sessionToken = getEnvVar('AWS_SESSION_TOKEN', false);
  const dynamodbEndpoint = getEnvVar('DYNAMODB_ENDPOINT', false);

  const config: Config = {
    aws: {
      region: getEnvVar('AWS_REGION', false, 'us-east-1'),
      dynamodbTablePrefix: getEnvVar('DYNAMODB_TABLE_PREFIX', false, 'feedback-'),
      ...(dynamodbEndpoint ? { dynamodbEndpoint } : {}),
    },
    bedrock: {
      modelId: getEnvVar('BEDROCK_MODEL_ID', false, 'amazon.nova-lite-v1:0'),
      temperature: getEnvVarAsFloat('BEDROCK_TEMPERATURE', 0.7),
      maxTokens: getEnvVarAsInt('BEDROCK_MAX_TOKENS', 1000),
      requestTimeoutMs: getEnvVarAsInt('BEDROCK_TIMEOUT_MS', 0),
      credentials: {
        accessKeyId: getEnvVar('AWS_ACCESS_KEY_ID'),
        secretAccessKey: getEnvVar('AWS_SECRET_ACCESS_KEY'),
        ...(sessionToken ? { sessionToken } : {}),
      },
    },
    server: {
      port: getEnvVarAsInt('PORT', 8080),
      logLevel: getLogLevel(),
      nodeEnv: getEnvVar('NODE_ENV', false, 'development'),
    },
    monitoring: {
      metricsEnabled: getEnvVarAsBoolean('METRICS_ENABLED', false),
      cloudwatchNamespace: getEnvVar('CLOUDWATCH_NAMESPACE', false, 'FeedbackAnalyzer/Backend'),
    },
  };

  validateConfig(config);

  return config;
}

let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing purposes - reset the singleton
export function resetConfig(): void {
  configInstance = null;
}
