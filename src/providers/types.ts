/**
 * 补全服务类型定义：Provider 无关的 LLM 调用接口。
 * 对话循环只依赖这里的类型，不直接依赖任何 SDK。
 *
 * 核心导出:
 * - CompletionProvider: 补全服务统一接口
 * - CompletionRequest / CompletionResponse: 单次请求与响应
 * - ConversationMessage / ContentBlock: 对话消息与内容块（按 type 区分的联合类型）
 * - ToolDescriptor: 传给模型的工具定义
 * - StopReason: 统一停止原因
 */

/** 文本块 */
export interface TextBlock {
  type: 'text';
  text: string;
}

/** 模型发起的工具调用 */
export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: Record<string, unknown>;
}

/** 工具结果，回传给模型 */
export interface ToolResultBlock {
  type: 'tool_result';
  tool_use_id: string;
  content: string;
  is_error?: boolean;
}

/** 补全响应中可能出现的内容块 */
export type ResponseContentBlock = TextBlock | ToolUseBlock;

/** 对话消息中可能出现的内容块 */
export type ContentBlock = TextBlock | ToolUseBlock | ToolResultBlock;

export interface ConversationMessage {
  role: 'user' | 'assistant';
  content: string | ContentBlock[];
}

/** 工具定义（传递给 LLM 的工具描述） */
export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export type StopReason =
  | 'end_turn'
  | 'tool_use'
  | 'max_tokens'
  | 'stop_sequence'
  | 'refusal'
  | 'pause_turn';

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface CompletionRequest {
  model: string;
  maxTokens: number;
  temperature: number;
  system?: string;
  messages: ConversationMessage[];
  /** 为空时必须省略，而不是传空数组 */
  tools?: ToolDescriptor[];
  abortSignal?: AbortSignal;
}

export interface CompletionResponse {
  stopReason: StopReason;
  content: ResponseContentBlock[];
  usage: TokenUsage;
}

/** 补全服务统一接口 */
export interface CompletionProvider {
  readonly name: string;
  createCompletion(request: CompletionRequest): Promise<CompletionResponse>;
}
