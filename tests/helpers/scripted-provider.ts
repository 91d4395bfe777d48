/**
 * 脚本化补全服务：按顺序返回预设响应并记录每次请求，供对话循环与编排器测试使用。
 */

import type {
  CompletionProvider,
  CompletionRequest,
  CompletionResponse,
  StopReason,
  TokenUsage,
} from '../../src/providers/types.ts';

export class ScriptedProvider implements CompletionProvider {
  readonly name = 'scripted';
  readonly requests: CompletionRequest[] = [];
  private readonly script: Array<CompletionResponse | Error>;

  constructor(script: Array<CompletionResponse | Error>) {
    this.script = [...script];
  }

  async createCompletion(request: CompletionRequest): Promise<CompletionResponse> {
    this.requests.push(request);
    const next = this.script.shift();
    if (next === undefined) {
      throw new Error(`No scripted response for request #${this.requests.length}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

export function textResponse(
  text: string,
  usage: TokenUsage = { inputTokens: 10, outputTokens: 5 },
  stopReason: StopReason = 'end_turn',
): CompletionResponse {
  return {
    stopReason,
    content: [{ type: 'text', text }],
    usage,
  };
}

export function toolUseResponse(
  id: string,
  name: string,
  input: Record<string, unknown>,
  usage: TokenUsage = { inputTokens: 10, outputTokens: 5 },
): CompletionResponse {
  return {
    stopReason: 'tool_use',
    content: [{ type: 'tool_use', id, name, input }],
    usage,
  };
}
