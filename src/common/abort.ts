/**
 * 中止信号工具
 *
 * 核心导出：
 * - createAbortError: 构造 name 为 AbortError 的错误
 * - isAbortError: 判断是否为中止错误
 * - throwIfAborted: 信号已中止时抛出
 */

export function createAbortError(message: string = 'Operation aborted'): Error {
  const error = new Error(message);
  error.name = 'AbortError';
  return error;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * 信号已中止时抛出 AbortError；where 用于错误信息定位中止发生的边界。
 */
export function throwIfAborted(signal: AbortSignal | undefined, where?: string): void {
  if (signal?.aborted) {
    throw createAbortError(where ? `Operation aborted before ${where}` : undefined);
  }
}
