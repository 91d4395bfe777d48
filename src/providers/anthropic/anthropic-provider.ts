/**
 * Anthropic Provider：实现统一 CompletionProvider 接口，基于 @anthropic-ai/sdk。
 * 负责将 CompletionRequest 转换为 Messages API 请求，并将响应与错误转回统一格式。
 *
 * 核心导出:
 * - AnthropicProvider: 实现 CompletionProvider 接口的 Anthropic Provider
 * - createAnthropicProvider: 工厂函数
 */

import Anthropic from '@anthropic-ai/sdk';
import type { CompletionProvider, CompletionRequest, CompletionResponse } from '../types.ts';
import {
  AuthenticationError,
  CompletionAPIError,
  RateLimitError,
  createAbortError,
  getErrorMessage,
} from '../../common/index.ts';
import { fromAnthropicMessage, toAnthropicParams } from './anthropic-mapper.ts';

export interface AnthropicProviderOptions {
  apiKey: string;
  baseURL?: string;
  /** SDK 内置重试次数 */
  maxRetries?: number;
}

const HTTP_STATUS_UNAUTHORIZED = 401;
const HTTP_STATUS_FORBIDDEN = 403;
const HTTP_STATUS_TOO_MANY_REQUESTS = 429;
const RETRY_AFTER_MS_MULTIPLIER = 1000;

export class AnthropicProvider implements CompletionProvider {
  readonly name = 'anthropic';
  private readonly client: Anthropic;

  constructor(options: AnthropicProviderOptions) {
    this.client = new Anthropic({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      maxRetries: options.maxRetries,
    });
  }

  async createCompletion(request: CompletionRequest): Promise<CompletionResponse> {
    let message: Anthropic.Message;
    try {
      message = await this.client.messages.create(
        toAnthropicParams(request),
        request.abortSignal ? { signal: request.abortSignal } : undefined,
      );
    } catch (error) {
      throw this.mapError(error);
    }

    if (!Array.isArray(message.content)) {
      throw new CompletionAPIError('Completion response has no content block list');
    }
    return fromAnthropicMessage(message);
  }

  /** 将 Anthropic SDK 错误映射为统一错误类型 */
  private mapError(error: unknown): Error {
    if (error instanceof Anthropic.APIUserAbortError) {
      return createAbortError(error.message);
    }
    if (error instanceof Anthropic.APIError) {
      const status = error.status;
      if (status === HTTP_STATUS_UNAUTHORIZED || status === HTTP_STATUS_FORBIDDEN) {
        return new AuthenticationError('anthropic', error.message, { cause: error });
      }
      if (status === HTTP_STATUS_TOO_MANY_REQUESTS) {
        const retryAfter = error.headers?.['retry-after'];
        const retryAfterMs = retryAfter
          ? parseInt(retryAfter, 10) * RETRY_AFTER_MS_MULTIPLIER
          : undefined;
        return new RateLimitError(
          Number.isFinite(retryAfterMs) ? retryAfterMs : undefined,
          error.message,
          { cause: error },
        );
      }
      return new CompletionAPIError(error.message, { status, cause: error });
    }
    return new CompletionAPIError(getErrorMessage(error), { cause: error });
  }
}

export function createAnthropicProvider(options: AnthropicProviderOptions): AnthropicProvider {
  return new AnthropicProvider(options);
}
