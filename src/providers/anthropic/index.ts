/**
 * Anthropic provider package index
 */

export {
  AnthropicProvider,
  createAnthropicProvider,
  type AnthropicProviderOptions,
} from './anthropic-provider.ts';
export {
  toAnthropicParams,
  toAnthropicMessages,
  toAnthropicTools,
  fromAnthropicMessage,
  mapStopReason,
} from './anthropic-mapper.ts';
