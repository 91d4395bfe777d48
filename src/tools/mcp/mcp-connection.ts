/**
 * MCP Connection
 *
 * 单个 MCP 服务端（本地子进程，stdio 传输）的连接。实现 ToolProviderConnection，
 * 负责握手、工具发现、工具调用与关闭。
 *
 * 核心导出:
 * - McpConnection: 已建立的 MCP 连接
 * - connectMcpServer: 启动进程并完成握手，失败时抛出 ConnectionError
 * - ConnectionState: 连接状态枚举
 * - toToolOutput: 将 CallToolResult 转换为工具结果值
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { CallToolResultSchema, type CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ToolDescriptor } from '../../providers/types.ts';
import type { ToolProviderConnection, ToolProviderSpec } from '../types.ts';
import { providerDisplayName } from '../types.ts';
import {
  CLIENT_NAME,
  CLIENT_VERSION,
  ConnectionError,
  MCP_CONNECT_TIMEOUT_MS,
  ProviderError,
  ToolError,
  getErrorMessage,
  type Logger,
} from '../../common/index.ts';

/** 连接状态 */
export enum ConnectionState {
  CONNECTED = 'connected',
  CLOSED = 'closed',
}

export interface McpConnectOptions {
  logger: Logger;
  timeoutMs?: number;
}

/**
 * 为 MCP transport 构建干净的环境变量映射
 */
function buildTransportEnv(
  baseEnv: NodeJS.ProcessEnv,
  extraEnv?: Record<string, string>,
): Record<string, string> {
  const merged = {
    ...baseEnv,
    ...(extraEnv || {}),
  };
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(merged)) {
    if (typeof value === 'string') {
      cleaned[key] = value;
    }
  }
  return cleaned;
}

/**
 * 将 CallToolResult 转换为工具结果值：
 * isError 视为调用失败；仅含文本块时返回拼接后的文本；
 * 有 structuredContent 时原样返回；否则返回内容块数组。
 */
export function toToolOutput(toolName: string, result: CallToolResult): unknown {
  const texts: string[] = [];
  let textOnly = true;
  for (const block of result.content) {
    if (block.type === 'text') {
      texts.push(block.text);
    } else {
      textOnly = false;
    }
  }

  if (result.isError) {
    throw new ToolError(toolName, texts.length > 0 ? texts.join('\n') : undefined);
  }
  if (result.structuredContent) {
    return result.structuredContent;
  }
  if (textOnly) {
    return texts.join('');
  }
  return result.content;
}

/**
 * McpConnection
 *
 * 由 connectMcpServer 创建，创建时握手已完成。工具列表在首次 listTools 后缓存。
 */
export class McpConnection implements ToolProviderConnection {
  readonly name: string;
  private state: ConnectionState = ConnectionState.CONNECTED;
  private cachedTools: ToolDescriptor[] | null = null;

  constructor(
    name: string,
    private readonly client: Client,
    private readonly logger: Logger,
  ) {
    this.name = name;
  }

  public getState(): ConnectionState {
    return this.state;
  }

  public async listTools(): Promise<ToolDescriptor[]> {
    this.assertConnected();
    if (this.cachedTools) return this.cachedTools;

    try {
      const response = await this.client.listTools();
      this.cachedTools = response.tools.map((tool) => ({
        name: tool.name,
        description: tool.description ?? '',
        inputSchema: { ...tool.inputSchema },
      }));
      return this.cachedTools;
    } catch (error) {
      throw new ProviderError(this.name, `Failed to list tools from ${this.name}: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }
  }

  public async callTool(name: string, input: Record<string, unknown>): Promise<unknown> {
    this.assertConnected();

    let raw: unknown;
    try {
      raw = await this.client.callTool({ name, arguments: input });
    } catch (error) {
      throw new ToolError(name, `Tool '${name}' failed on ${this.name}: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }

    const parsed = CallToolResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ToolError(name, `Tool '${name}' on ${this.name} returned a malformed result`);
    }
    return toToolOutput(name, parsed.data);
  }

  public async close(): Promise<void> {
    if (this.state === ConnectionState.CLOSED) return;
    this.state = ConnectionState.CLOSED;
    try {
      await this.client.close();
      this.logger.debug({ provider: this.name }, 'MCP connection closed');
    } catch (error) {
      this.logger.warn({ provider: this.name, err: error }, 'Error closing MCP connection');
    }
  }

  private assertConnected(): void {
    if (this.state !== ConnectionState.CONNECTED) {
      throw new ConnectionError(this.name, `Connection to ${this.name} is closed`);
    }
  }
}

/**
 * 启动 MCP 服务端进程并完成握手。
 */
export async function connectMcpServer(
  spec: ToolProviderSpec,
  options: McpConnectOptions,
): Promise<McpConnection> {
  const name = providerDisplayName(spec);
  const transport = new StdioClientTransport({
    command: spec.command,
    args: spec.args,
    env: buildTransportEnv(process.env, spec.env),
    cwd: spec.cwd,
  });
  const client = new Client(
    { name: CLIENT_NAME, version: CLIENT_VERSION },
    { capabilities: {} },
  );

  try {
    await client.connect(transport, { timeout: options.timeoutMs ?? MCP_CONNECT_TIMEOUT_MS });
  } catch (error) {
    await client.close().catch((closeError: unknown) => {
      options.logger.debug({ provider: name, err: closeError }, 'Error releasing failed MCP transport');
    });
    throw new ConnectionError(name, `Failed to connect to MCP server ${name}: ${getErrorMessage(error)}`, {
      cause: error,
    });
  }

  options.logger.info(
    { provider: name, serverVersion: client.getServerVersion()?.name },
    'Connected to MCP server',
  );
  return new McpConnection(name, client, options.logger);
}
