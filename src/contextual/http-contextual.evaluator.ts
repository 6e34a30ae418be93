import { Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';
import contextualConfig from '../config/contextual.config';
import { ContextualEvaluatorError } from '../common/errors';
import { errorMessage } from '../common/utils/error.util';
import { isRecord } from '../common/utils/json.util';
import { sleep } from '../common/utils/retry.util';
import { BusinessEnvironmentVector } from '../environment/interfaces/bev.interface';
import { parseAssessment } from './assessment.parser';
import { buildMessages } from './bev-prompt';
import { ContextualAssessment, ContextualEvaluator } from './interfaces/contextual.interface';

interface ChatCompletionResponse {
  model?: string;
  choices?: Array<{ message?: { content?: string | null } }>;
}

/**
 * Contextual evaluator backed by an OpenAI-compatible chat completions
 * endpoint. Timeouts and 5xx responses are retried.
 */
export class HttpContextualEvaluator implements ContextualEvaluator {
  readonly name = 'http';
  private readonly logger = new Logger(HttpContextualEvaluator.name);
  private readonly client: AxiosInstance;

  constructor(private readonly config: ConfigType<typeof contextualConfig>) {
    this.client = axios.create({
      baseURL: config.baseURL,
      timeout: config.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        ...(config.apiKey ? { Authorization: `Bearer ${config.apiKey}` } : {}),
      },
    });
  }

  async assess(
    bev: BusinessEnvironmentVector,
    categories: readonly string[],
    signal?: AbortSignal,
  ): Promise<ContextualAssessment> {
    const data = await this.complete(
      {
        model: this.config.model,
        messages: buildMessages(bev, categories),
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens,
        response_format: { type: 'json_object' },
      },
      signal,
    );

    const content = data.choices?.[0]?.message?.content;
    if (!content) {
      throw new ContextualEvaluatorError('Contextual reply was empty');
    }

    const assessment = parseAssessment(content, categories, data.model ?? this.config.model);
    this.logger.debug(
      `Assessment from ${assessment.model}: ${JSON.stringify(assessment.probabilities)}`,
    );
    return assessment;
  }

  /**
   * Posts a completion request, retrying timeouts and 5xx responses with a
   * linearly growing delay.
   */
  private async complete(
    body: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<ChatCompletionResponse> {
    for (let retry = 0; ; retry++) {
      try {
        const response = await this.client.post<ChatCompletionResponse>('/chat/completions', body, {
          signal,
        });
        return response.data;
      } catch (error) {
        if (!isRetryable(error) || retry >= this.config.maxRetries || signal?.aborted) {
          throw toEvaluatorError(error);
        }
        this.logger.warn(
          `Contextual request failed (${errorMessage(error)}); retry ${retry + 1}/${this.config.maxRetries}`,
        );
        await sleep(this.config.retryDelayMs * (retry + 1));
      }
    }
  }
}

function isRetryable(error: unknown): boolean {
  if (!axios.isAxiosError(error) || axios.isCancel(error)) {
    return false;
  }
  const status = error.response?.status ?? 0;
  return error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT' || status >= 500;
}

function toEvaluatorError(error: unknown): ContextualEvaluatorError {
  if (error instanceof ContextualEvaluatorError) {
    return error;
  }
  if (!axios.isAxiosError<unknown>(error)) {
    return new ContextualEvaluatorError(`Contextual request failed: ${errorMessage(error)}`);
  }
  if (axios.isCancel(error)) {
    return new ContextualEvaluatorError('Contextual request aborted');
  }

  const timedOut = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
  if (error.response) {
    const { status, statusText, data } = error.response;
    return new ContextualEvaluatorError(
      `Contextual endpoint answered ${status}: ${responseMessage(data) ?? statusText}`,
    );
  }
  if (error.request) {
    return new ContextualEvaluatorError('No response received from contextual endpoint', timedOut);
  }
  return new ContextualEvaluatorError(error.message, timedOut);
}

function responseMessage(data: unknown): string | undefined {
  if (!isRecord(data)) {
    return undefined;
  }
  if (typeof data.message === 'string') {
    return data.message;
  }
  if (isRecord(data.error) && typeof data.error.message === 'string') {
    return data.error.message;
  }
  return undefined;
}
