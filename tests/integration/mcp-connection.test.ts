/**
 * MCP Connection 集成测试
 * 测试目标: 通过 SDK 内存传输连接真实的 MCP 服务端，验证工具发现、调用与注册表派发。
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { McpConnection } from '../../src/tools/mcp/mcp-connection.ts';
import { ToolRegistry } from '../../src/tools/tool-registry.ts';
import { ToolError, ToolNotFoundError } from '../../src/common/errors.ts';
import { createLogger } from '../../src/common/logger.ts';
import { connectTestMcpServer, type LinkedMcpPair } from '../fixtures/test-mcp-server.ts';

const logger = createLogger({ level: 'silent' });

describe('McpConnection over an in-memory transport', () => {
  let pair: LinkedMcpPair;
  let connection: McpConnection;

  beforeEach(async () => {
    pair = await connectTestMcpServer();
    connection = new McpConnection('memory', pair.client, logger);
  });

  afterEach(async () => {
    await connection.close();
    await pair.server.close();
  });

  it('should list the server tools', async () => {
    const tools = await connection.listTools();
    expect(tools.map((tool) => tool.name)).toEqual(['echo', 'add', 'fail']);
    expect(tools[0]).toEqual({
      name: 'echo',
      description: 'Echoes the input message back',
      inputSchema: {
        type: 'object',
        properties: { message: { type: 'string' } },
        required: ['message'],
      },
    });
  });

  it('should return text results', async () => {
    await expect(connection.callTool('echo', { message: 'hello' })).resolves.toBe('hello');
    await expect(connection.callTool('add', { a: 2, b: 3 })).resolves.toBe('5');
  });

  it('should raise ToolError for isError results', async () => {
    await expect(connection.callTool('fail', {})).rejects.toThrow(new ToolError('fail', 'quota exhausted'));
  });

  it('should raise ToolError for unknown tools', async () => {
    const error = await connection.callTool('nope', {}).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ToolError);
    expect(error).toHaveProperty('message', expect.stringContaining('Unknown tool: nope'));
  });

  it('should dispatch through the registry', async () => {
    const registry = new ToolRegistry(logger);
    registry.register(connection, await connection.listTools());

    await expect(registry.dispatch('add', { a: 1, b: 1 })).resolves.toBe('2');
    await expect(registry.dispatch('missing', {})).rejects.toBeInstanceOf(ToolNotFoundError);
  });
});
