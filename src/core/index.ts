/**
 * Agent Core 模块：对话循环与编排器。
 *
 * 核心导出:
 * - AgentOrchestrator / runAgent: 单次运行编排
 * - ConversationLoop: 工具增强的对话状态机
 * - buildTaskMessage / extractText: 消息工具
 * - AgentConfig / Task / RunResult / LoopState / LoopEvent: 核心类型
 */

export {
  AgentOrchestrator,
  runAgent,
  resolveApiKey,
  freezeConfig,
  type AgentDependencies,
  type CompletionProviderOptions,
  type RunOptions,
} from './agent.ts';
export {
  ConversationLoop,
  describeToolFailure,
  type ConversationLoopOptions,
  type LoopOutcome,
  type LoopSettings,
  type ToolDispatcher,
} from './conversation-loop.ts';
export {
  CONTEXT_HEADER,
  buildTaskMessage,
  extractText,
  findFirstToolUse,
  serializeContext,
  toolResultMessage,
} from './messages.ts';
export {
  LoopState,
  type AgentConfig,
  type LoopEvent,
  type LoopObserver,
  type RunResult,
  type Task,
  type ToolErrorPolicy,
} from './types.ts';
