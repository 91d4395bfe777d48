/**
 * Anthropic SDK 格式转换器：统一补全格式与 Anthropic Messages API 格式互转。
 *
 * 核心导出:
 * - toAnthropicParams: CompletionRequest -> messages.create 参数
 * - toAnthropicMessages: 统一消息 -> Anthropic 消息
 * - toAnthropicTools: 统一工具定义 -> Anthropic 工具
 * - fromAnthropicMessage: Anthropic 响应 -> CompletionResponse
 * - mapStopReason: 停止原因归一化
 */

import type Anthropic from '@anthropic-ai/sdk';
import type {
  CompletionRequest,
  CompletionResponse,
  ContentBlock,
  ConversationMessage,
  ResponseContentBlock,
  StopReason,
  ToolDescriptor,
} from '../types.ts';

/** 将 CompletionRequest 转换为 messages.create 参数；tools 为空时不出现在参数中 */
export function toAnthropicParams(
  request: CompletionRequest,
): Anthropic.MessageCreateParamsNonStreaming {
  const params: Anthropic.MessageCreateParamsNonStreaming = {
    model: request.model,
    max_tokens: request.maxTokens,
    temperature: request.temperature,
    messages: toAnthropicMessages(request.messages),
  };

  if (request.system) {
    params.system = request.system;
  }

  if (request.tools && request.tools.length > 0) {
    params.tools = toAnthropicTools(request.tools);
  }

  return params;
}

export function toAnthropicMessages(
  messages: ConversationMessage[],
): Anthropic.MessageParam[] {
  return messages.map((msg) => ({
    role: msg.role,
    content: typeof msg.content === 'string'
      ? msg.content
      : msg.content.map(toAnthropicContentBlock),
  }));
}

function toAnthropicContentBlock(block: ContentBlock): Anthropic.ContentBlockParam {
  switch (block.type) {
    case 'text':
      return { type: 'text', text: block.text };
    case 'tool_use':
      return { type: 'tool_use', id: block.id, name: block.name, input: block.input };
    case 'tool_result':
      return {
        type: 'tool_result',
        tool_use_id: block.tool_use_id,
        content: block.content,
        ...(block.is_error ? { is_error: true } : {}),
      };
  }
}

export function toAnthropicTools(tools: ToolDescriptor[]): Anthropic.Tool[] {
  return tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    input_schema: { ...tool.inputSchema, type: 'object' },
  }));
}

/**
 * 将 Anthropic 完整响应转换为 CompletionResponse。
 * 只保留 text 与 tool_use 块；thinking / redacted_thinking 等其余块被丢弃，
 * 因此回写到对话中的 assistant 消息不含这些块。请求从不开启 extended thinking，
 * 开启前需先让 ResponseContentBlock 携带 thinking 块并在 toAnthropicMessages 中回传。
 */
export function fromAnthropicMessage(message: Anthropic.Message): CompletionResponse {
  const content: ResponseContentBlock[] = [];

  for (const block of message.content) {
    if (block.type === 'text') {
      content.push({ type: 'text', text: block.text });
    } else if (block.type === 'tool_use') {
      content.push({
        type: 'tool_use',
        id: block.id,
        name: block.name,
        input: isRecord(block.input) ? block.input : {},
      });
    }
  }

  return {
    content,
    stopReason: mapStopReason(message.stop_reason),
    usage: {
      inputTokens: message.usage.input_tokens,
      outputTokens: message.usage.output_tokens,
    },
  };
}

/** 映射 Anthropic 停止原因到统一格式；未知值与 null 视为 end_turn */
export function mapStopReason(reason: string | null): StopReason {
  switch (reason) {
    case 'tool_use':
    case 'max_tokens':
    case 'stop_sequence':
    case 'refusal':
    case 'pause_turn':
      return reason;
    default:
      return 'end_turn';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
