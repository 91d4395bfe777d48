/**
 * 全局常量定义：运行参数支持环境变量覆盖。
 *
 * 核心导出:
 * - DEFAULT_MODEL / DEFAULT_MAX_TOKENS / DEFAULT_TEMPERATURE: 补全请求默认参数
 * - MAX_TURNS: 单次运行允许的最大补全调用次数
 * - MCP_CONNECT_TIMEOUT_MS: MCP 握手超时
 * - DEFAULT_LOG_LEVEL: 默认日志级别
 */

import { parseEnvPositiveInt } from './env.ts';

export const DEFAULT_MODEL = 'claude-3-5-sonnet-20241022';

export const DEFAULT_MAX_TOKENS = 4096;

export const DEFAULT_TEMPERATURE = 1.0;

/** 最大补全调用次数 */
export const MAX_TURNS = parseEnvPositiveInt(process.env.TASK_AGENT_MAX_TURNS, 50);

/** MCP 连接握手超时（毫秒） */
export const MCP_CONNECT_TIMEOUT_MS = parseEnvPositiveInt(
  process.env.TASK_AGENT_MCP_TIMEOUT_MS,
  30000,
);

/** 默认日志级别 */
export const DEFAULT_LOG_LEVEL = 'info';

export const CLIENT_NAME = 'task-agent';
export const CLIENT_VERSION = '0.1.0';
