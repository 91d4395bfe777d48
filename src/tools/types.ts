/**
 * 工具提供方类型定义：对话循环与具体传输（MCP stdio）之间的边界。
 *
 * 核心导出:
 * - ToolProviderSpec: 启动一个工具提供方进程所需的参数
 * - ToolProviderConnection: 单个已连接提供方的能力（列举 / 调用 / 关闭）
 * - ConnectToolProvider: 建立连接的函数签名，便于替换为测试替身
 */

import type { ToolDescriptor } from '../providers/types.ts';

export interface ToolProviderSpec {
  /** 仅用于日志；缺省时使用命令行（command 与 args） */
  name?: string;
  command: string;
  args: string[];
  /** 叠加在父进程环境变量之上 */
  env?: Record<string, string>;
  cwd?: string;
}

export interface ToolProviderConnection {
  readonly name: string;
  /** 返回提供方当前声明的工具；失败时抛出 ProviderError */
  listTools(): Promise<ToolDescriptor[]>;
  /** 调用工具；提供方是该工具是否存在的唯一依据，失败时抛出 ToolError */
  callTool(name: string, input: Record<string, unknown>): Promise<unknown>;
  /** 幂等；不抛出 */
  close(): Promise<void>;
}

export type ConnectToolProvider = (spec: ToolProviderSpec) => Promise<ToolProviderConnection>;

/** 提供方在日志中的显示名 */
export function providerDisplayName(spec: ToolProviderSpec): string {
  return spec.name ?? [spec.command, ...spec.args].join(' ');
}
