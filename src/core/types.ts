/**
 * Agent Core 核心类型定义：对话循环与编排器的公共契约。
 *
 * 核心导出:
 * - AgentConfig: 单次运行的配置（运行开始后冻结）
 * - Task: 任务指令与可选上下文
 * - RunResult: 运行最终结果
 * - LoopState: 对话循环状态
 * - LoopEvent / LoopObserver: 循环进度事件与观察者
 * - ToolErrorPolicy: 工具调用失败的处理策略
 */

import type { StopReason, TokenUsage } from '../providers/types.ts';
import type { ToolProviderSpec } from '../tools/types.ts';

/**
 * fail: 工具调用失败即终止整个运行（默认）
 * report: 将错误文本作为 is_error 的 tool_result 回传给模型
 */
export type ToolErrorPolicy = 'fail' | 'report';

export interface AgentConfig {
  /** 缺省时读取 ANTHROPIC_API_KEY */
  apiKey?: string;
  /** 缺省时读取 ANTHROPIC_BASE_URL */
  baseURL?: string;
  model: string;
  maxTokens: number;
  temperature: number;
  mcpServers: ToolProviderSpec[];
  maxTurns: number;
  toolErrorPolicy: ToolErrorPolicy;
  systemPrompt?: string;
}

export interface Task {
  instruction: string;
  context?: Record<string, unknown>;
}

export interface RunResult {
  response: string;
  model: string;
  stopReason: StopReason;
  /** 最终响应的用量 */
  usage: TokenUsage;
  /** 本次运行所有补全调用的累计用量 */
  totalUsage: TokenUsage;
  /** 补全调用次数 */
  turnCount: number;
}

export enum LoopState {
  AWAITING_MODEL = 'awaiting_model',
  MODEL_WANTS_TOOL = 'model_wants_tool',
  EXECUTING_TOOL = 'executing_tool',
  DONE = 'done',
  FAILED = 'failed',
}

export type LoopEvent =
  | { type: 'turn_start'; turnIndex: number }
  | { type: 'tool_start'; toolName: string; toolId: string; input: Record<string, unknown> }
  | { type: 'tool_end'; toolName: string; toolId: string; output: string; isError: boolean; duration: number }
  | { type: 'loop_end'; state: LoopState.DONE | LoopState.FAILED; turnCount: number };

export type LoopObserver = (event: LoopEvent) => void;
