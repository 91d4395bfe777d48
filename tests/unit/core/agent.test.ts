/**
 * AgentOrchestrator 单元测试
 * 测试目标: 凭据解析早于连接、连接失败不致命、注册顺序与连接完成顺序无关、
 * 每条退出路径都关闭连接、结果不可变。
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  AgentOrchestrator,
  freezeConfig,
  resolveApiKey,
  runAgent,
  type CompletionProviderOptions,
} from '../../../src/core/agent.ts';
import type { AgentConfig } from '../../../src/core/types.ts';
import type { ToolProviderSpec } from '../../../src/tools/types.ts';
import {
  CompletionAPIError,
  ConfigError,
  ConnectionError,
} from '../../../src/common/errors.ts';
import { createLogger } from '../../../src/common/logger.ts';
import { FakeConnection } from '../../helpers/fake-connection.ts';
import { ScriptedProvider, textResponse, toolUseResponse } from '../../helpers/scripted-provider.ts';

const logger = createLogger({ level: 'silent' });

function makeConfig(overrides: Partial<AgentConfig> = {}): AgentConfig {
  return {
    apiKey: 'test-secret',
    model: 'claude-test',
    maxTokens: 1024,
    temperature: 0,
    mcpServers: [],
    maxTurns: 10,
    toolErrorPolicy: 'fail',
    ...overrides,
  };
}

function server(name: string): ToolProviderSpec {
  return { name, command: `${name}-server`, args: [] };
}

interface Harness {
  orchestrator: AgentOrchestrator;
  provider: ScriptedProvider;
  providerOptions: CompletionProviderOptions[];
  connected: string[];
}

function createHarness(
  provider: ScriptedProvider,
  connections: Record<string, FakeConnection | Error>,
  delays: Record<string, number> = {},
): Harness {
  const providerOptions: CompletionProviderOptions[] = [];
  const connected: string[] = [];
  const orchestrator = new AgentOrchestrator({
    logger,
    createProvider: (options) => {
      providerOptions.push(options);
      return provider;
    },
    connect: async (spec) => {
      const key = spec.name ?? spec.command;
      const delay = delays[key] ?? 0;
      if (delay > 0) {
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
      const connection = connections[key];
      if (connection === undefined) {
        throw new ConnectionError(key, `No fake for ${key}`);
      }
      if (connection instanceof Error) {
        throw connection;
      }
      connected.push(key);
      return connection;
    },
  });
  return { orchestrator, provider, providerOptions, connected };
}

describe('AgentOrchestrator', () => {
  beforeEach(() => {
    vi.stubEnv('ANTHROPIC_API_KEY', '');
    vi.stubEnv('ANTHROPIC_BASE_URL', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should answer a task without tool providers', async () => {
    const harness = createHarness(new ScriptedProvider([textResponse('4')]), {});

    const result = await harness.orchestrator.run(makeConfig(), { instruction: 'What is 2+2?' });

    expect(result).toEqual({
      response: '4',
      model: 'claude-test',
      stopReason: 'end_turn',
      usage: { inputTokens: 10, outputTokens: 5 },
      totalUsage: { inputTokens: 10, outputTokens: 5 },
      turnCount: 1,
    });
    expect(harness.providerOptions).toEqual([{ apiKey: 'test-secret', baseURL: undefined }]);
    expect(harness.provider.requests[0]?.messages).toEqual([{ role: 'user', content: 'What is 2+2?' }]);
  });

  it('should reject a missing API key before connecting anything', async () => {
    const connect = vi.fn();
    const orchestrator = new AgentOrchestrator({ logger, connect });

    await expect(
      orchestrator.run(makeConfig({ apiKey: undefined, mcpServers: [server('alpha')] }), { instruction: 'x' }),
    ).rejects.toBeInstanceOf(ConfigError);
    expect(connect).not.toHaveBeenCalled();
  });

  it('should fall back to environment variables for credentials and base URL', async () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'env-test-secret');
    vi.stubEnv('ANTHROPIC_BASE_URL', 'http://localhost:8080');
    const harness = createHarness(new ScriptedProvider([textResponse('ok')]), {});

    await harness.orchestrator.run(makeConfig({ apiKey: undefined }), { instruction: 'x' });

    expect(harness.providerOptions).toEqual([
      { apiKey: 'env-test-secret', baseURL: 'http://localhost:8080' },
    ]);
  });

  it('should append the task context to the first message', async () => {
    const harness = createHarness(new ScriptedProvider([textResponse('ok')]), {});

    await harness.orchestrator.run(makeConfig(), { instruction: 'Summarize.', context: { doc: 'a' } });

    expect(harness.provider.requests[0]?.messages[0]?.content).toBe(
      'Summarize.\n\nAdditional context:\n{\n  "doc": "a"\n}',
    );
  });

  it('should continue when one provider fails to connect', async () => {
    const alpha = new FakeConnection('alpha', { search: () => 'hit' });
    const harness = createHarness(
      new ScriptedProvider([toolUseResponse('t1', 'search', {}), textResponse('found it')]),
      { alpha, beta: new ConnectionError('beta', 'spawn ENOENT') },
    );

    const result = await harness.orchestrator.run(
      makeConfig({ mcpServers: [server('alpha'), server('beta')] }),
      { instruction: 'Find it.' },
    );

    expect(result.response).toBe('found it');
    expect(harness.connected).toEqual(['alpha']);
    expect(alpha.closeCount).toBe(1);
  });

  it('should register providers in declaration order regardless of connect timing', async () => {
    const slow = new FakeConnection('slow', { search: () => 'from slow' });
    const fast = new FakeConnection('fast', { search: () => 'from fast' });
    const harness = createHarness(
      new ScriptedProvider([toolUseResponse('t1', 'search', {}), textResponse('done')]),
      { slow, fast },
      { slow: 20 },
    );

    await harness.orchestrator.run(
      makeConfig({ mcpServers: [server('slow'), server('fast')] }),
      { instruction: 'Search.' },
    );

    expect(harness.connected).toEqual(['fast', 'slow']);
    expect(harness.provider.requests[0]?.tools?.map((tool) => tool.description)).toEqual([
      'search from slow',
      'search from fast',
    ]);
    expect(slow.calls).toHaveLength(1);
    expect(fast.calls).toHaveLength(0);
  });

  it('should leave providers whose listing fails out of the catalog but close them', async () => {
    const broken = new FakeConnection('broken', { hidden: () => 'x' }, { listFails: true });
    const harness = createHarness(new ScriptedProvider([textResponse('ok')]), { broken });

    await harness.orchestrator.run(makeConfig({ mcpServers: [server('broken')] }), { instruction: 'x' });

    expect(harness.provider.requests[0] && 'tools' in harness.provider.requests[0]).toBe(false);
    expect(broken.closeCount).toBe(1);
  });

  it('should close every connection when the run fails', async () => {
    const alpha = new FakeConnection('alpha', {}, { closeError: new Error('close failed') });
    const beta = new FakeConnection('beta');
    const harness = createHarness(
      new ScriptedProvider([new CompletionAPIError('overloaded', { status: 529 })]),
      { alpha, beta },
    );

    await expect(
      harness.orchestrator.run(makeConfig({ mcpServers: [server('alpha'), server('beta')] }), { instruction: 'x' }),
    ).rejects.toThrow('overloaded');
    expect(alpha.closeCount).toBe(1);
    expect(beta.closeCount).toBe(1);
  });

  it('should return a frozen result', async () => {
    const harness = createHarness(new ScriptedProvider([textResponse('ok')]), {});

    const result = await harness.orchestrator.run(makeConfig(), { instruction: 'x' });

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.usage)).toBe(true);
    expect(Object.isFrozen(result.totalUsage)).toBe(true);
  });

  it('should report the final response usage alongside the run total', async () => {
    const echo = new FakeConnection('echo', { echo: () => 'pong' });
    const harness = createHarness(
      new ScriptedProvider([
        toolUseResponse('t1', 'echo', {}, { inputTokens: 100, outputTokens: 7 }),
        textResponse('done', { inputTokens: 120, outputTokens: 3 }),
      ]),
      { echo },
    );

    const result = await harness.orchestrator.run(makeConfig({ mcpServers: [server('echo')] }), { instruction: 'x' });

    expect(result.usage).toEqual({ inputTokens: 120, outputTokens: 3 });
    expect(result.totalUsage).toEqual({ inputTokens: 220, outputTokens: 10 });
  });

  it('should run through the runAgent helper', async () => {
    const provider = new ScriptedProvider([textResponse('helper')]);
    const result = await runAgent(makeConfig(), { instruction: 'x' }, { logger, createProvider: () => provider });
    expect(result.response).toBe('helper');
  });
});

describe('resolveApiKey', () => {
  it('should prefer the configured key', () => {
    expect(resolveApiKey(makeConfig(), { ANTHROPIC_API_KEY: 'env-test-secret' })).toBe('test-secret');
  });

  it('should read the environment when the config has none', () => {
    expect(resolveApiKey(makeConfig({ apiKey: undefined }), { ANTHROPIC_API_KEY: 'env-test-secret' })).toBe(
      'env-test-secret',
    );
  });

  it('should throw ConfigError when no key is available', () => {
    expect(() => resolveApiKey(makeConfig({ apiKey: '  ' }), {})).toThrow(
      'API key must be provided in config or the ANTHROPIC_API_KEY environment variable',
    );
  });
});

describe('freezeConfig', () => {
  it('should deep-copy and freeze provider specs', () => {
    const spec: ToolProviderSpec = { name: 'alpha', command: 'alpha-server', args: ['--x'], env: { A: '1' } };
    const config = makeConfig({ mcpServers: [spec] });

    const frozen = freezeConfig(config);
    spec.args.push('--mutated');

    expect(Object.isFrozen(frozen)).toBe(true);
    expect(Object.isFrozen(frozen.mcpServers[0])).toBe(true);
    expect(frozen.mcpServers[0]?.args).toEqual(['--x']);
    expect(frozen.mcpServers[0]?.env).not.toBe(spec.env);
  });
});
