/**
 * Logger 单元测试：验证日志实例创建与运行 ID 上下文。
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  createChildLogger,
  createLogger,
  getRunId,
  withRunId,
} from '../../../src/common/logger.ts';
import { DEFAULT_LOG_LEVEL } from '../../../src/common/constants.ts';

describe('createLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should honor an explicit level', () => {
    const logger = createLogger({ level: 'silent' });
    expect(logger.level).toBe('silent');
  });

  it('should read LOG_LEVEL when no level is given', () => {
    vi.stubEnv('LOG_LEVEL', 'warn');
    expect(createLogger({ pretty: false }).level).toBe('warn');
  });

  it('should fall back to the info level', () => {
    const saved = process.env.LOG_LEVEL;
    delete process.env.LOG_LEVEL;
    try {
      expect(DEFAULT_LOG_LEVEL).toBe('info');
      expect(createLogger({ pretty: false }).level).toBe('info');
    } finally {
      if (saved !== undefined) process.env.LOG_LEVEL = saved;
    }
  });

  it('should bind the module on child loggers', () => {
    const child = createChildLogger(createLogger({ level: 'silent' }), 'tool-registry');
    expect(child.bindings()).toMatchObject({ module: 'tool-registry' });
  });
});

describe('withRunId', () => {
  it('should expose the run id inside the callback only', () => {
    expect(getRunId()).toBeUndefined();
    const seen = withRunId('run-1', () => getRunId());
    expect(seen).toBe('run-1');
    expect(getRunId()).toBeUndefined();
  });

  it('should propagate across awaits', async () => {
    const seen = await withRunId('run-2', async () => {
      await Promise.resolve();
      return getRunId();
    });
    expect(seen).toBe('run-2');
  });
});
