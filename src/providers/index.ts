/**
 * 补全服务模块：统一接口与 Anthropic 实现。
 */

export type {
  CompletionProvider,
  CompletionRequest,
  CompletionResponse,
  ContentBlock,
  ConversationMessage,
  ResponseContentBlock,
  StopReason,
  TextBlock,
  TokenUsage,
  ToolDescriptor,
  ToolResultBlock,
  ToolUseBlock,
} from './types.ts';
export {
  AnthropicProvider,
  createAnthropicProvider,
  type AnthropicProviderOptions,
} from './anthropic/index.ts';
