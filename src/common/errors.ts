/**
 * 统一错误类型体系：定义 task-agent 所有自定义错误类型。
 * 每种错误类型对应特定的故障场景，携带结构化的上下文信息。
 *
 * 核心导出:
 * - AgentError: 基础错误类（含 code 和 recoverable 属性）
 * - ConfigError: 缺少必要配置或凭据
 * - ConnectionError: 工具提供方连接失败
 * - ProviderError: 工具列表获取失败
 * - ToolError / ToolNotFoundError: 工具调用失败 / 无任何提供方认领该工具
 * - CompletionAPIError / AuthenticationError / RateLimitError: 补全服务失败
 * - SerializationError: 工具结果无法序列化
 * - MaxTurnsExceededError: 超过最大补全调用次数
 * - isAgentError: 类型守卫函数
 */

/** 基础错误类 */
export class AgentError extends Error {
  public readonly code: string;
  /** 可恢复错误不终止运行 */
  public readonly recoverable: boolean;

  constructor(message: string, code: string, options?: ErrorOptions & { recoverable?: boolean }) {
    super(message, options);
    this.name = 'AgentError';
    this.code = code;
    this.recoverable = options?.recoverable ?? false;
  }
}

export function isAgentError(error: unknown): error is AgentError {
  return error instanceof AgentError;
}

/** 缺少必要凭据或参数；在连接任何提供方之前抛出 */
export class ConfigError extends AgentError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** 单个工具提供方无法连接 */
export class ConnectionError extends AgentError {
  public readonly provider: string;

  constructor(provider: string, message?: string, options?: ErrorOptions) {
    super(
      message ?? `Failed to connect to tool provider: ${provider}`,
      'CONNECTION_ERROR',
      { ...options, recoverable: true },
    );
    this.name = 'ConnectionError';
    this.provider = provider;
  }
}

/** 工具列表获取失败 */
export class ProviderError extends AgentError {
  public readonly provider: string;

  constructor(provider: string, message?: string, options?: ErrorOptions) {
    super(
      message ?? `Failed to list tools from provider: ${provider}`,
      'PROVIDER_ERROR',
      { ...options, recoverable: true },
    );
    this.name = 'ProviderError';
    this.provider = provider;
  }
}

/** 工具调用失败 */
export class ToolError extends AgentError {
  public readonly toolName: string;

  constructor(toolName: string, message?: string, options?: ErrorOptions & { code?: string }) {
    super(
      message ?? `Tool execution failed: ${toolName}`,
      options?.code ?? 'TOOL_ERROR',
      options,
    );
    this.name = 'ToolError';
    this.toolName = toolName;
  }
}

/** 一次失败的派发尝试：absent 表示该提供方未声明此工具，failed 表示声明了但调用出错 */
export interface DispatchAttempt {
  provider: string;
  outcome: 'absent' | 'failed';
  message: string;
}

/** 所有提供方均未成功执行该工具 */
export class ToolNotFoundError extends ToolError {
  public readonly attempts: DispatchAttempt[];

  constructor(toolName: string, attempts: DispatchAttempt[] = []) {
    super(
      toolName,
      `Tool '${toolName}' not found on any connected tool provider`,
      { code: 'TOOL_NOT_FOUND' },
    );
    this.name = 'ToolNotFoundError';
    this.attempts = attempts;
  }
}

/** 补全服务失败或返回了无法解析的内容 */
export class CompletionAPIError extends AgentError {
  public readonly status: number | undefined;

  constructor(message: string, options?: ErrorOptions & { status?: number; code?: string }) {
    super(message, options?.code ?? 'COMPLETION_API_ERROR', options);
    this.name = 'CompletionAPIError';
    this.status = options?.status;
  }
}

/** API Key 无效或认证失败 */
export class AuthenticationError extends CompletionAPIError {
  public readonly provider: string;

  constructor(provider: string, message?: string, options?: ErrorOptions) {
    super(
      message ?? `Authentication failed for provider: ${provider}`,
      { ...options, code: 'AUTHENTICATION_ERROR' },
    );
    this.name = 'AuthenticationError';
    this.provider = provider;
  }
}

/** 速率限制触发 */
export class RateLimitError extends CompletionAPIError {
  public readonly retryAfterMs: number | undefined;

  constructor(retryAfterMs?: number, message?: string, options?: ErrorOptions) {
    super(
      message ?? `Rate limit exceeded${retryAfterMs ? `, retry after ${retryAfterMs}ms` : ''}`,
      { ...options, status: 429, code: 'RATE_LIMIT_ERROR' },
    );
    this.name = 'RateLimitError';
    this.retryAfterMs = retryAfterMs;
  }
}

/** 工具结果无法转为文本；仅在序列化器内部使用，不会向外传播 */
export class SerializationError extends AgentError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'SERIALIZATION_ERROR', { ...options, recoverable: true });
    this.name = 'SerializationError';
  }
}

/** 超过最大补全调用次数 */
export class MaxTurnsExceededError extends AgentError {
  public readonly maxTurns: number;

  constructor(maxTurns: number) {
    super(`Conversation exceeded the maximum of ${maxTurns} turns`, 'MAX_TURNS_EXCEEDED');
    this.name = 'MaxTurnsExceededError';
    this.maxTurns = maxTurns;
  }
}

/** 读取错误信息文本 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
