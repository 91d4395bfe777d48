/**
 * 公共基础设施模块：日志、错误、常量、环境变量解析、中止信号。
 */

export {
  type Logger,
  type CreateLoggerOptions,
  createLogger,
  createChildLogger,
  getRunId,
  withRunId,
} from './logger.ts';
export {
  AgentError,
  ConfigError,
  ConnectionError,
  ProviderError,
  ToolError,
  ToolNotFoundError,
  CompletionAPIError,
  AuthenticationError,
  RateLimitError,
  SerializationError,
  MaxTurnsExceededError,
  isAgentError,
  getErrorMessage,
  type DispatchAttempt,
} from './errors.ts';
export {
  DEFAULT_MODEL,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  MAX_TURNS,
  MCP_CONNECT_TIMEOUT_MS,
  DEFAULT_LOG_LEVEL,
  CLIENT_NAME,
  CLIENT_VERSION,
} from './constants.ts';
export { parseEnvPositiveInt, parseEnvOptionalString } from './env.ts';
export { createAbortError, isAbortError, throwIfAborted } from './abort.ts';
