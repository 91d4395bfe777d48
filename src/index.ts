/**
 * task-agent public API
 *
 * 核心导出:
 * - runAgent / AgentOrchestrator: 运行单个任务
 * - ConversationLoop / ToolRegistry: 可单独组合的核心组件
 * - AnthropicProvider / connectMcpServer: 默认的补全服务与工具提供方实现
 * - loadRunPayloadFromFile / loadRunPayloadFromJson: 载荷加载
 */

export * from './core/index.ts';
export * from './common/index.ts';
export * from './providers/index.ts';
export * from './config/index.ts';
export { ToolRegistry } from './tools/tool-registry.ts';
export { serializeToolResult, toStructuredText } from './tools/result-serializer.ts';
export {
  McpConnection,
  ConnectionState,
  connectMcpServer,
  toToolOutput,
  type McpConnectOptions,
} from './tools/mcp/mcp-connection.ts';
export type {
  ConnectToolProvider,
  ToolProviderConnection,
  ToolProviderSpec,
} from './tools/types.ts';
