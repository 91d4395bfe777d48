/**
 * Configuration module
 *
 * Core exports:
 * - RunPayloadSchema / AgentConfigSchema / ToolProviderSpecSchema: zod schemas
 * - loadRunPayloadFromFile / loadRunPayloadFromJson / parseRunPayload: loaders
 */

export {
  AgentConfigSchema,
  RunPayloadSchema,
  ToolProviderSpecSchema,
  normalizeConfigKeys,
  type RunPayload,
} from './run-payload-schema.ts';
export {
  formatIssues,
  loadRunPayloadFromFile,
  loadRunPayloadFromJson,
  parseRunPayload,
} from './payload-loader.ts';
