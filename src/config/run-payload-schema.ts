/**
 * Run Payload Schema
 *
 * Defines the zod schemas for the JSON payload a run is started from:
 * `{ config, task, context? }`, where `task` is either the instruction text
 * or `{ instruction, context? }`.
 *
 * Config keys are camelCase; the snake_case spellings (`max_tokens`,
 * `mcp_servers`, ...) are accepted as aliases. When both spellings are
 * present the camelCase one wins.
 *
 * Core Exports:
 * - ToolProviderSpecSchema: one MCP server launch spec
 * - AgentConfigSchema: agent configuration with defaults
 * - RunPayloadSchema: full payload, normalized to { config, task }
 * - RunPayload: TypeScript type of a normalized payload
 */

import { z } from 'zod';
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_MODEL,
  DEFAULT_TEMPERATURE,
  MAX_TURNS,
} from '../common/index.ts';
import type { AgentConfig, Task } from '../core/types.ts';

/**
 * snake_case aliases of config keys
 */
const CONFIG_KEY_ALIASES: Record<string, string> = {
  api_key: 'apiKey',
  base_url: 'baseURL',
  max_tokens: 'maxTokens',
  mcp_servers: 'mcpServers',
  max_turns: 'maxTurns',
  tool_error_policy: 'toolErrorPolicy',
  system_prompt: 'systemPrompt',
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Rewrite snake_case config keys to their camelCase names.
 */
export function normalizeConfigKeys(raw: unknown): unknown {
  if (!isPlainObject(raw)) return raw;

  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    const alias = CONFIG_KEY_ALIASES[key];
    if (alias === undefined) {
      normalized[key] = value;
    } else if (!(alias in raw)) {
      normalized[alias] = value;
    }
  }
  return normalized;
}

const ContextSchema = z
  .record(z.unknown())
  .nullish()
  .transform((value) => value ?? undefined);

/**
 * MCP server launch spec
 */
export const ToolProviderSpecSchema = z.object({
  /** Display name used in logs */
  name: z.string().min(1).optional(),
  command: z.string().min(1, 'command must not be empty'),
  args: z.array(z.string()).default([]),
  env: z
    .record(z.string())
    .nullish()
    .transform((value) => value ?? undefined),
  cwd: z.string().min(1).optional(),
});

/**
 * Agent configuration schema
 */
export const AgentConfigSchema = z.preprocess(
  normalizeConfigKeys,
  z.object({
    // 允许缺省，实际校验在 Orchestrator 启动时进行（可回退到环境变量）
    apiKey: z.string().optional(),
    baseURL: z.string().url().optional(),
    model: z.string().min(1).default(DEFAULT_MODEL),
    maxTokens: z.number().int().positive().default(DEFAULT_MAX_TOKENS),
    temperature: z.number().min(0).max(1).default(DEFAULT_TEMPERATURE),
    mcpServers: z.array(ToolProviderSpecSchema).default([]),
    maxTurns: z.number().int().positive().default(MAX_TURNS),
    toolErrorPolicy: z.enum(['fail', 'report']).default('fail'),
    systemPrompt: z.string().min(1).optional(),
  }),
);

const TaskSchema = z.union([
  z.string().min(1, 'task must not be empty'),
  z.object({
    instruction: z.string().min(1, 'instruction must not be empty'),
    context: ContextSchema,
  }),
]);

/**
 * Full run payload, normalized so that the context always lives on the task.
 * A context inside `task` takes precedence over the top-level one.
 */
export const RunPayloadSchema = z
  .object({
    config: AgentConfigSchema,
    task: TaskSchema,
    context: ContextSchema,
  })
  .transform((payload): RunPayload => {
    const task: Task = typeof payload.task === 'string'
      ? { instruction: payload.task }
      : { instruction: payload.task.instruction };
    const context = typeof payload.task === 'string'
      ? payload.context
      : payload.task.context ?? payload.context;
    if (context !== undefined) {
      task.context = context;
    }
    return { config: payload.config, task };
  });

export interface RunPayload {
  config: AgentConfig;
  task: Task;
}
