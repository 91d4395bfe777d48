/**
 * 进程内工具提供方替身：实现 ToolProviderConnection，记录调用与关闭次数。
 */

import type { ToolDescriptor } from '../../src/providers/types.ts';
import type { ToolProviderConnection } from '../../src/tools/types.ts';
import { ProviderError, ToolError } from '../../src/common/index.ts';

export type ToolHandler = (input: Record<string, unknown>) => unknown;

export interface FakeConnectionOptions {
  /** listTools 失败 */
  listFails?: boolean;
  /** close 抛出该错误 */
  closeError?: Error;
  /** 声明但不可调用的工具 */
  advertisedOnly?: string[];
}

export class FakeConnection implements ToolProviderConnection {
  readonly calls: Array<{ name: string; input: Record<string, unknown> }> = [];
  closeCount = 0;

  constructor(
    readonly name: string,
    private readonly handlers: Record<string, ToolHandler> = {},
    private readonly options: FakeConnectionOptions = {},
  ) {}

  async listTools(): Promise<ToolDescriptor[]> {
    if (this.options.listFails) {
      throw new ProviderError(this.name, `${this.name} cannot list tools`);
    }
    const names = [...Object.keys(this.handlers), ...(this.options.advertisedOnly ?? [])];
    return names.map((name) => ({
      name,
      description: `${name} from ${this.name}`,
      inputSchema: { type: 'object', properties: {} },
    }));
  }

  async callTool(name: string, input: Record<string, unknown>): Promise<unknown> {
    this.calls.push({ name, input });
    const handler = this.handlers[name];
    if (!handler) {
      throw new ToolError(name, `Unknown tool: ${name}`);
    }
    return handler(input);
  }

  async close(): Promise<void> {
    this.closeCount += 1;
    if (this.options.closeError) {
      throw this.options.closeError;
    }
  }
}
