import OpenAI, { APIConnectionError, APIError, AzureOpenAI } from 'openai';
import { logger } from '../utils/logger';

export interface EmbeddingProvider {
  embedQuery(text: string): Promise<number[]>;
  embedDocuments(texts: string[]): Promise<number[][]>;
}

/**
 * The part of the OpenAI client used here
 */
export interface EmbeddingsClient {
  embeddings: {
    create(params: { model: string; input: string[] }): Promise<{
      data: Array<{ index: number; embedding: number[] }>;
    }>;
  };
}

export interface OpenAIEmbeddingConfig {
  provider: 'openai' | 'azure';
  model: string;
  apiKey?: string;
  azureEndpoint?: string;
  azureApiKey?: string;
  azureApiVersion?: string;
  batchSize?: number;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
}

const DEFAULT_BATCH_SIZE = 64;
const DEFAULT_TIMEOUT_MS = 30000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_DELAY_MS = 1000;

/**
 * Embeddings from OpenAI or an Azure OpenAI deployment.
 *
 * Requests are batched and transient failures (timeouts, rate limits,
 * 5xx) retried with exponential backoff.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private client: EmbeddingsClient;
  private model: string;
  private batchSize: number;
  private maxRetries: number;
  private retryDelayMs: number;

  constructor(config: OpenAIEmbeddingConfig, client?: EmbeddingsClient) {
    this.model = config.model;
    this.batchSize = config.batchSize ?? DEFAULT_BATCH_SIZE;
    this.maxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryDelayMs = config.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    const timeout = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;

    if (client) {
      this.client = client;
    } else if (config.provider === 'azure') {
      if (!config.azureEndpoint || !config.azureApiKey) {
        throw new Error('Azure OpenAI endpoint and API key are required for the azure embedding provider');
      }
      this.client = new AzureOpenAI({
        endpoint: config.azureEndpoint,
        apiKey: config.azureApiKey,
        apiVersion: config.azureApiVersion,
        deployment: config.model,
        timeout,
        maxRetries: 0
      });
    } else {
      if (!config.apiKey) {
        throw new Error('OpenAI API key is required for the openai embedding provider');
      }
      this.client = new OpenAI({
        apiKey: config.apiKey,
        timeout,
        maxRetries: 0 // retries are handled here
      });
    }
  }

  async embedQuery(text: string): Promise<number[]> {
    const [embedding] = await this.embedWithRetry([text]);
    return embedding;
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    const embeddings: number[][] = [];
    const totalBatches = Math.ceil(texts.length / this.batchSize);

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const batchNum = Math.floor(i / this.batchSize) + 1;
      logger.debug('Embedding batch', {
        operation: 'embed_documents'
      }, { batchNum, totalBatches, size: batch.length });
      embeddings.push(...await this.embedWithRetry(batch));
    }

    return embeddings;
  }

  private async embedWithRetry(input: string[], attempt = 1): Promise<number[][]> {
    try {
      const response = await this.client.embeddings.create({
        model: this.model,
        input
      });
      return [...response.data]
        .sort((a, b) => a.index - b.index)
        .map(item => item.embedding);
    } catch (error) {
      if (isRetryableError(error) && attempt < this.maxRetries) {
        const delay = this.retryDelayMs * Math.pow(2, attempt - 1);
        logger.warn('Embedding request failed, retrying', {
          operation: 'embedding_retry'
        }, { attempt, maxRetries: this.maxRetries, delayMs: delay, error: (error as Error).message });
        await sleep(delay);
        return this.embedWithRetry(input, attempt + 1);
      }
      throw error;
    }
  }
}

const RETRYABLE_STATUSES = new Set([408, 409, 429]);

/**
 * Connection failures and timeouts, 408/409/429 and 5xx responses are transient
 */
export function isRetryableError(error: unknown): boolean {
  // APIConnectionTimeoutError extends APIConnectionError
  if (error instanceof APIConnectionError) {
    return true;
  }
  if (error instanceof APIError) {
    const status = error.status;
    return status !== undefined && (RETRYABLE_STATUSES.has(status) || status >= 500);
  }
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return ['etimedout', 'econnreset', 'econnrefused', 'enotfound'].some(code => message.includes(code));
  }
  return false;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
