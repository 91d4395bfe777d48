/**
 * 日志基础设施：基于 pino 的结构化日志工具。
 * 支持 JSON（生产）和人类可读（开发）两种输出格式，
 * 通过 AsyncLocalStorage 传播运行 ID。
 *
 * 核心导出:
 * - Logger: pino Logger 类型别名
 * - createLogger: 创建根日志实例
 * - createChildLogger: 创建带模块上下文的子日志实例
 * - withRunId / getRunId: 运行 ID 上下文
 */

import pino from 'pino';
import { AsyncLocalStorage } from 'node:async_hooks';
import { DEFAULT_LOG_LEVEL } from './constants.ts';

const runIdStore = new AsyncLocalStorage<string>();

/** pino Logger 类型别名 */
export type Logger = pino.Logger;

export interface CreateLoggerOptions {
  level?: string;
  name?: string;
  /** 强制开启/关闭 pino-pretty；默认仅在非 production 环境开启 */
  pretty?: boolean;
}

/** 获取当前运行 ID */
export function getRunId(): string | undefined {
  return runIdStore.getStore();
}

/** 在运行 ID 上下文中执行函数 */
export function withRunId<T>(runId: string, fn: () => T): T {
  return runIdStore.run(runId, fn);
}

/**
 * 创建根日志实例。
 * 开发环境使用 pino-pretty 格式化（输出到 stderr，stdout 留给运行结果），
 * 生产环境输出 JSON。level 为 silent 时不启动 transport。
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? DEFAULT_LOG_LEVEL;
  const pretty = options.pretty ?? process.env.NODE_ENV !== 'production';

  return pino({
    name: options.name ?? 'task-agent',
    level,
    mixin() {
      const runId = getRunId();
      return runId ? { runId } : {};
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    transport: pretty && level !== 'silent'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            destination: 2,
          },
        }
      : undefined,
  });
}

/**
 * 创建带模块上下文的子日志实例。
 */
export function createChildLogger(parent: Logger, module: string): Logger {
  return parent.child({ module });
}
