/**
 * 工具结果序列化：将任意工具结果值转换为 tool_result 块的文本内容。
 *
 * 核心导出:
 * - serializeToolResult: 字符串原样返回；其余值尝试 JSON 序列化，失败时退化为 String()
 * - toStructuredText: 严格的 JSON 序列化，失败时抛出 SerializationError
 */

import { SerializationError, getErrorMessage } from '../common/index.ts';

/**
 * 严格序列化。JSON.stringify 对 undefined、函数、symbol 返回 undefined，
 * 对循环引用与 BigInt 抛出；两种情况都转为 SerializationError。
 */
export function toStructuredText(value: unknown): string {
  let encoded: string | undefined;
  try {
    encoded = JSON.stringify(value);
  } catch (error) {
    throw new SerializationError(`Tool result is not JSON-serializable: ${getErrorMessage(error)}`, {
      cause: error,
    });
  }
  if (encoded === undefined) {
    throw new SerializationError(`Tool result of type ${typeof value} has no JSON representation`);
  }
  return encoded;
}

export const UNSERIALIZABLE_PLACEHOLDER = '[unserializable tool result]';

/** 无条件转换为字符串，不会抛出 */
function toLiteralString(value: unknown): string {
  try {
    return String(value);
  } catch {
    // 例如 Object.create(null) 或 toString 抛错的对象
    try {
      return Object.prototype.toString.call(value);
    } catch {
      // 已撤销的 Proxy
      return UNSERIALIZABLE_PLACEHOLDER;
    }
  }
}

export function serializeToolResult(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  try {
    return toStructuredText(value);
  } catch (error) {
    if (error instanceof SerializationError) {
      return toLiteralString(value);
    }
    throw error;
  }
}
