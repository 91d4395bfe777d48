/**
 * Tool registry aggregating the catalogs of every connected tool provider.
 *
 * The model sees one flat namespace. Names are not de-duplicated: when two
 * providers advertise the same tool, both entries stay in the catalog and
 * dispatch tries the provider registered first.
 *
 * Core exports:
 * - ToolRegistry: ordered provider list with linear-probe dispatch
 */

import type { ToolDescriptor } from '../providers/types.ts';
import type { ToolProviderConnection } from './types.ts';
import {
  ToolNotFoundError,
  getErrorMessage,
  type DispatchAttempt,
  type Logger,
} from '../common/index.ts';

interface RegisteredProvider {
  connection: ToolProviderConnection;
  tools: ToolDescriptor[];
  toolNames: Set<string>;
}

export class ToolRegistry {
  private readonly providers: RegisteredProvider[] = [];

  constructor(private readonly logger?: Logger) {}

  /**
   * Register a connected provider with the catalog it returned from listTools().
   * Registration order is dispatch order.
   */
  register(connection: ToolProviderConnection, tools: ToolDescriptor[]): void {
    this.providers.push({
      connection,
      tools,
      toolNames: new Set(tools.map((tool) => tool.name)),
    });
  }

  /** Every advertised tool, in registration order. */
  allTools(): ToolDescriptor[] {
    return this.providers.flatMap((provider) => provider.tools);
  }

  providerNames(): string[] {
    return this.providers.map((provider) => provider.connection.name);
  }

  get size(): number {
    return this.providers.length;
  }

  /**
   * Try each provider in registration order; the first call that does not
   * fail wins. Every provider is asked, even one whose catalog lacks the
   * name, since the provider is the source of truth for what it hosts.
   *
   * @throws ToolNotFoundError when every provider failed
   */
  async dispatch(name: string, input: Record<string, unknown>): Promise<unknown> {
    const attempts: DispatchAttempt[] = [];

    for (const provider of this.providers) {
      try {
        return await provider.connection.callTool(name, input);
      } catch (error) {
        attempts.push({
          provider: provider.connection.name,
          outcome: provider.toolNames.has(name) ? 'failed' : 'absent',
          message: getErrorMessage(error),
        });
      }
    }

    this.logger?.warn({ tool: name, attempts }, 'No tool provider handled the tool call');
    throw new ToolNotFoundError(name, attempts);
  }
}
