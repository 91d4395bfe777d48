/**
 * 对话消息工具：初始消息构建与响应内容提取。
 *
 * 核心导出:
 * - buildTaskMessage: 由任务指令与上下文构建首条 user 消息
 * - serializeContext: 上下文序列化，失败时返回 undefined
 * - extractText: 按顺序拼接所有 text 块
 * - findFirstToolUse: 取响应中的第一个 tool_use 块
 * - toolResultMessage: 构建携带单个 tool_result 块的 user 消息
 */

import type {
  ConversationMessage,
  ResponseContentBlock,
  ToolUseBlock,
} from '../providers/types.ts';
import { getErrorMessage, type Logger } from '../common/index.ts';
import type { Task } from './types.ts';

export const CONTEXT_HEADER = '\n\nAdditional context:\n';

/**
 * 上下文按 2 空格缩进 JSON 序列化。
 * 循环引用、BigInt 等无法序列化的值返回 undefined，调用方按无上下文处理。
 */
export function serializeContext(
  context: Record<string, unknown>,
  logger?: Logger,
): string | undefined {
  try {
    return JSON.stringify(context, null, 2);
  } catch (error) {
    logger?.warn({ err: error }, `Task context is not serializable, ignoring it: ${getErrorMessage(error)}`);
    return undefined;
  }
}

export function buildTaskMessage(task: Task, logger?: Logger): ConversationMessage {
  let content = task.instruction;
  if (task.context && Object.keys(task.context).length > 0) {
    const serialized = serializeContext(task.context, logger);
    if (serialized !== undefined) {
      content += CONTEXT_HEADER + serialized;
    }
  }
  return { role: 'user', content };
}

export function extractText(content: ResponseContentBlock[]): string {
  let text = '';
  for (const block of content) {
    if (block.type === 'text') {
      text += block.text;
    }
  }
  return text;
}

export function findFirstToolUse(content: ResponseContentBlock[]): ToolUseBlock | undefined {
  for (const block of content) {
    if (block.type === 'tool_use') {
      return block;
    }
  }
  return undefined;
}

export function toolResultMessage(
  toolUseId: string,
  payload: string,
  isError = false,
): ConversationMessage {
  return {
    role: 'user',
    content: [
      {
        type: 'tool_result',
        tool_use_id: toolUseId,
        content: payload,
        ...(isError ? { is_error: true } : {}),
      },
    ],
  };
}
