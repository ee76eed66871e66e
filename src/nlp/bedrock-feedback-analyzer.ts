/**
 * Bedrock Feedback Analyzer
 *
 * Sends the aggregated feedback prompt to an Amazon Bedrock model through the
 * Converse API and parses the reply into a sentiment summary.
 *
 * The client is built explicitly with its own credentials and with SDK retries
 * turned off: a failed call surfaces once as an AIServiceError.
 */

import {
  BedrockRuntimeClient,
  BedrockRuntimeClientConfig,
  ConverseCommand,
} from '@aws-sdk/client-bedrock-runtime';
import { NodeHttpHandler } from '@smithy/node-http-handler';
import { getLogger } from '../monitoring/logger';
import { getMetricsEmitter } from '../monitoring/metrics';
import { AIServiceError, ValidationError } from '../errors/types';
import { buildAnalysisPrompt } from './prompt-builder';
import { parseAnalysisResponse } from './response-parser';
import { FeedbackAnalyzer, FeedbackRecord, SentimentResult } from './types';

const logger = getLogger();

export interface BedrockCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}

export interface BedrockAnalyzerConfig {
  region: string;
  modelId: string;
  temperature: number;
  maxTokens: number;
  /** 0 disables the request timeout */
  requestTimeoutMs: number;
  credentials: BedrockCredentials;
}

export class BedrockFeedbackAnalyzer implements FeedbackAnalyzer {
  private readonly client: BedrockRuntimeClient;
  private readonly config: BedrockAnalyzerConfig;

  constructor(config: BedrockAnalyzerConfig, client?: BedrockRuntimeClient) {
    if (!config.credentials.accessKeyId || !config.credentials.secretAccessKey) {
      throw new AIServiceError('AI service credentials are not configured');
    }

    this.config = config;
    this.client = client ?? new BedrockRuntimeClient(BedrockFeedbackAnalyzer.clientConfig(config));

    logger.info('Bedrock feedback analyzer initialized', {
      region: config.region,
      modelId: config.modelId,
      temperature: config.temperature,
      maxTokens: config.maxTokens,
      requestTimeoutMs: config.requestTimeoutMs,
    });
  }

  static clientConfig(config: BedrockAnalyzerConfig): BedrockRuntimeClientConfig {
    const { accessKeyId, secretAccessKey, sessionToken } = config.credentials;

    return {
      region: config.region,
      credentials: {
        accessKeyId,
        secretAccessKey,
        ...(sessionToken ? { sessionToken } : {}),
      },
      maxAttempts: 1,
      ...(config.requestTimeoutMs > 0
        ? { requestHandler: new NodeHttpHandler({ requestTimeout: config.requestTimeoutMs }) }
        : {}),
    };
  }

  async analyzeFeedback(records: FeedbackRecord[]): Promise<SentimentResult> {
    if (records.length === 0) {
      throw new ValidationError('No feedback data provided', [
        { field: 'records', message: 'At least one feedback record is required' },
      ]);
    }

    const prompt = buildAnalysisPrompt(records);
    const startTime = Date.now();

    let responseText: string;
    try {
      const response = await this.client.send(
        new ConverseCommand({
          modelId: this.config.modelId,
          messages: [
            {
              role: 'user',
              content: [{ text: prompt }],
            },
          ],
          inferenceConfig: {
            maxTokens: this.config.maxTokens,
            temperature: this.config.temperature,
          },
        })
      );

      responseText = response.output?.message?.content?.[0]?.text ?? '';

      logger.info('Bedrock analysis response received', {
        event: 'bedrock_response',
        recordCount: records.length,
        responseLength: responseText.length,
        durationMs: Date.now() - startTime,
        stopReason: response.stopReason,
        modelId: this.config.modelId,
      });
    } catch (error) {
      logger.error(
        'Bedrock analysis call failed',
        {
          event: 'bedrock_failed',
          recordCount: records.length,
          durationMs: Date.now() - startTime,
          modelId: this.config.modelId,
        },
        error instanceof Error ? error : new Error(String(error))
      );
      throw AIServiceError.fromError(error, 'Bedrock API error');
    }

    const metricsEmitter = getMetricsEmitter();
    if (metricsEmitter) {
      await metricsEmitter.emitBedrockLatency(Date.now() - startTime, this.config.modelId);
    }

    if (!responseText) {
      logger.warn('Empty response from model', { modelId: this.config.modelId });
    }

    return parseAnalysisResponse(responseText);
  }

  destroy(): void {
    this.client.destroy();
  }
}
