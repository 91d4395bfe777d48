/**
 * Agent Orchestrator：单次运行的编排器。
 *
 * 负责：解析凭据（缺失即抛出 ConfigError，早于任何连接），并发连接所有工具提供方并按声明顺序注册，
 * 构建首条消息，驱动 ConversationLoop，并在每条退出路径上逐个关闭已打开的连接。
 *
 * 核心导出:
 * - AgentOrchestrator: 编排器
 * - AgentDependencies: 可注入的依赖（日志、补全服务工厂、连接函数、观察者）
 * - runAgent: 便捷函数
 * - resolveApiKey / freezeConfig: 配置辅助函数
 */

import { randomUUID } from 'node:crypto';
import type { CompletionProvider } from '../providers/types.ts';
import { createAnthropicProvider } from '../providers/anthropic/index.ts';
import { connectMcpServer } from '../tools/mcp/mcp-connection.ts';
import { ToolRegistry } from '../tools/tool-registry.ts';
import {
  providerDisplayName,
  type ConnectToolProvider,
  type ToolProviderConnection,
  type ToolProviderSpec,
} from '../tools/types.ts';
import {
  ConfigError,
  createChildLogger,
  getErrorMessage,
  parseEnvOptionalString,
  withRunId,
  type Logger,
} from '../common/index.ts';
import { ConversationLoop } from './conversation-loop.ts';
import { buildTaskMessage } from './messages.ts';
import type { AgentConfig, LoopObserver, RunResult, Task } from './types.ts';

export interface CompletionProviderOptions {
  apiKey: string;
  baseURL?: string;
}

export interface AgentDependencies {
  logger: Logger;
  /** 默认创建 AnthropicProvider */
  createProvider?: (options: CompletionProviderOptions) => CompletionProvider;
  /** 默认通过 stdio 启动 MCP 服务端 */
  connect?: ConnectToolProvider;
  observer?: LoopObserver;
}

export interface RunOptions {
  abortSignal?: AbortSignal;
}

/** config.apiKey 优先，其次 ANTHROPIC_API_KEY；都没有时抛出 ConfigError */
export function resolveApiKey(config: AgentConfig, env: NodeJS.ProcessEnv = process.env): string {
  const apiKey = parseEnvOptionalString(config.apiKey) ?? parseEnvOptionalString(env.ANTHROPIC_API_KEY);
  if (!apiKey) {
    throw new ConfigError(
      'API key must be provided in config or the ANTHROPIC_API_KEY environment variable',
      ['config.apiKey'],
    );
  }
  return apiKey;
}

/** 拷贝并冻结配置，确保运行期间不可变 */
export function freezeConfig(config: AgentConfig): Readonly<AgentConfig> {
  const frozen: AgentConfig = {
    ...config,
    mcpServers: config.mcpServers.map((spec) => Object.freeze({
      ...spec,
      args: [...spec.args],
      ...(spec.env ? { env: { ...spec.env } } : {}),
    })),
  };
  return Object.freeze(frozen);
}

export class AgentOrchestrator {
  private readonly logger: Logger;
  private readonly createProvider: (options: CompletionProviderOptions) => CompletionProvider;
  private readonly connect: ConnectToolProvider;

  constructor(private readonly deps: AgentDependencies) {
    this.logger = createChildLogger(deps.logger, 'agent');
    this.createProvider = deps.createProvider ?? createAnthropicProvider;
    const mcpLogger = createChildLogger(deps.logger, 'mcp');
    this.connect = deps.connect ?? ((spec) => connectMcpServer(spec, { logger: mcpLogger }));
  }

  async run(config: AgentConfig, task: Task, options: RunOptions = {}): Promise<RunResult> {
    return withRunId(randomUUID(), () => this.execute(config, task, options));
  }

  private async execute(config: AgentConfig, task: Task, options: RunOptions): Promise<RunResult> {
    const apiKey = resolveApiKey(config);
    const settings = freezeConfig(config);
    const provider = this.createProvider({
      apiKey,
      baseURL: settings.baseURL ?? parseEnvOptionalString(process.env.ANTHROPIC_BASE_URL),
    });

    this.logger.info(
      { model: settings.model, providers: settings.mcpServers.length },
      'Starting agent run',
    );

    const connections = await this.connectAll(settings.mcpServers);
    try {
      const registry = await this.buildRegistry(connections);
      const loop = new ConversationLoop({
        provider,
        tools: registry,
        settings,
        logger: this.deps.logger,
        observer: this.deps.observer,
        abortSignal: options.abortSignal,
      });

      const outcome = await loop.run([buildTaskMessage(task, this.logger)]);
      this.logger.info(
        { stopReason: outcome.stopReason, turns: outcome.turnCount, usage: outcome.totalUsage },
        'Agent run finished',
      );

      return Object.freeze({
        response: outcome.response,
        model: settings.model,
        stopReason: outcome.stopReason,
        usage: Object.freeze({ ...outcome.usage }),
        totalUsage: Object.freeze({ ...outcome.totalUsage }),
        turnCount: outcome.turnCount,
      });
    } finally {
      await this.closeAll(connections);
    }
  }

  /**
   * 并发连接，结果按声明顺序返回；单个提供方失败只记录日志。
   */
  private async connectAll(specs: readonly ToolProviderSpec[]): Promise<ToolProviderConnection[]> {
    const settled = await Promise.allSettled(specs.map((spec) => this.connect(spec)));
    const connections: ToolProviderConnection[] = [];

    settled.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        connections.push(result.value);
      } else {
        const spec = specs[index];
        this.logger.warn(
          { provider: spec ? providerDisplayName(spec) : index, err: result.reason },
          `Failed to connect to tool provider: ${getErrorMessage(result.reason)}`,
        );
      }
    });

    return connections;
  }

  /** 依次获取工具列表；失败的提供方不进入注册表，但仍会被关闭 */
  private async buildRegistry(connections: ToolProviderConnection[]): Promise<ToolRegistry> {
    const registry = new ToolRegistry(createChildLogger(this.deps.logger, 'tool-registry'));

    for (const connection of connections) {
      try {
        const tools = await connection.listTools();
        registry.register(connection, tools);
        this.logger.debug(
          { provider: connection.name, tools: tools.map((tool) => tool.name) },
          'Registered tool provider',
        );
      } catch (error) {
        this.logger.warn(
          { provider: connection.name, err: error },
          `Error getting tools from tool provider: ${getErrorMessage(error)}`,
        );
      }
    }

    return registry;
  }

  /** 每个连接独立关闭，一个失败不影响其余 */
  private async closeAll(connections: ToolProviderConnection[]): Promise<void> {
    for (const connection of connections) {
      try {
        await connection.close();
      } catch (error) {
        this.logger.warn({ provider: connection.name, err: error }, 'Error closing tool provider');
      }
    }
  }
}

export function runAgent(
  config: AgentConfig,
  task: Task,
  deps: AgentDependencies,
  options?: RunOptions,
): Promise<RunResult> {
  return new AgentOrchestrator(deps).run(config, task, options);
}
