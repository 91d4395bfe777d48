/**
 * Run command - Execute one task payload through the agent.
 *
 * The payload comes from a JSON file path or an inline `--json` string.
 * The result is printed to stdout; logs and verbose progress go to stderr.
 *
 * Core exports:
 * - RunCommandOptions: Options interface for run command
 * - resolvePayload: Load the payload from a file or inline JSON
 * - runCommand: Main function to execute a task payload
 */

import { AgentOrchestrator, type AgentDependencies } from '../../core/agent.ts';
import type { LoopObserver, RunResult } from '../../core/types.ts';
import {
  loadRunPayloadFromFile,
  loadRunPayloadFromJson,
  type RunPayload,
} from '../../config/index.ts';
import { createLogger, type Logger } from '../../common/index.ts';
import { CLIError, formatLoopEvent, formatRunResult } from '../formatters/output.ts';

export interface RunCommandOptions {
  json?: string;
  raw?: boolean;
  verbose?: boolean;
}

/** Injection points for tests */
export interface RunCommandContext {
  logger?: Logger;
  write?: (text: string) => void;
  writeProgress?: (text: string) => void;
  dependencies?: Partial<Omit<AgentDependencies, 'logger' | 'observer'>>;
  abortSignal?: AbortSignal;
}

export async function resolvePayload(
  payloadPath: string | undefined,
  options: RunCommandOptions,
): Promise<RunPayload> {
  if (options.json !== undefined) {
    return loadRunPayloadFromJson(options.json);
  }
  if (!payloadPath) {
    throw new CLIError('Provide a payload file path or --json <payload>');
  }
  return loadRunPayloadFromFile(payloadPath);
}

export async function runCommand(
  payloadPath: string | undefined,
  options: RunCommandOptions,
  context: RunCommandContext = {},
): Promise<RunResult> {
  const payload = await resolvePayload(payloadPath, options);
  const logger = context.logger ?? createLogger({ level: options.verbose ? 'debug' : undefined });
  const write = context.write ?? ((text: string) => process.stdout.write(`${text}\n`));
  const writeProgress = context.writeProgress ?? ((text: string) => process.stderr.write(`${text}\n`));

  const observer: LoopObserver | undefined = options.verbose
    ? (event) => {
        const line = formatLoopEvent(event);
        if (line !== null) writeProgress(line);
      }
    : undefined;

  const orchestrator = new AgentOrchestrator({
    ...context.dependencies,
    logger,
    observer,
  });

  const result = await orchestrator.run(payload.config, payload.task, {
    abortSignal: context.abortSignal,
  });
  write(formatRunResult(result, options.raw));
  return result;
}
