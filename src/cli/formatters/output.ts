/**
 * Output formatters - Format output for CLI display.
 *
 * This file provides utilities for formatting CLI output including
 * run results, tool-call progress lines and error messages.
 *
 * Core exports:
 * - formatRunResult: Render a RunResult as JSON, optionally under a banner
 * - formatLoopEvent: Render a tool-call event for verbose mode
 * - formatError: Format error messages with stack traces
 * - CLIError: Custom error class for CLI errors
 * - handleError: Print an error and exit
 */

import chalk from 'chalk';
import type { LoopEvent, RunResult } from '../../core/types.ts';
import { ConfigError, isAgentError } from '../../common/index.ts';

const BANNER_WIDTH = 80;
const PREVIEW_LIMIT = 200;

/**
 * Custom CLI error with exit code.
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public exitCode: number = 1
  ) {
    super(message);
    this.name = 'CLIError';
  }
}

/**
 * Render a run result. Without `raw` the JSON is framed by an
 * `AGENT RESULT` banner.
 */
export function formatRunResult(result: RunResult, raw = false): string {
  const json = JSON.stringify(result, null, 2);
  if (raw) {
    return json;
  }
  const rule = '='.repeat(BANNER_WIDTH);
  return ['', rule, 'AGENT RESULT', rule, json].join('\n');
}

function preview(text: string): string {
  const singleLine = text.replace(/\s+/g, ' ').trim();
  return singleLine.length > PREVIEW_LIMIT
    ? `${singleLine.slice(0, PREVIEW_LIMIT)}...`
    : singleLine;
}

/**
 * Render a loop event for verbose mode. Returns null for events that
 * are not printed.
 */
export function formatLoopEvent(event: LoopEvent): string | null {
  switch (event.type) {
    case 'tool_start':
      return chalk.blue(`→ ${event.toolName}`) + chalk.gray(` ${JSON.stringify(event.input)}`);
    case 'tool_end': {
      const status = event.isError ? chalk.red('✗') : chalk.green('✓');
      return `${status} ${chalk.gray(`${event.toolName} (${event.duration}ms)`)} ${preview(event.output)}`;
    }
    default:
      return null;
  }
}

/**
 * Format an error for CLI output.
 *
 * @param error - Error object or string
 * @param withStack - Include the stack trace
 */
export function formatError(error: Error | string, withStack = true): string {
  if (typeof error === 'string') {
    return chalk.red('Error: ') + error;
  }

  const lines = [
    chalk.red.bold('Error:'),
    chalk.red(`  ${error.message}`),
  ];

  if (withStack && error.stack) {
    lines.push('');
    lines.push(chalk.gray('Stack trace:'));
    error.stack.split('\n').slice(1).forEach(line => {
      lines.push(chalk.gray(`  ${line.trim()}`));
    });
  }

  return lines.join('\n');
}

/**
 * Handle error and exit process. Known agent errors are printed without
 * a stack trace.
 *
 * @param error - Error to handle
 */
export function handleError(error: unknown): never {
  if (error instanceof CLIError) {
    console.error(formatError(error.message));
    process.exit(error.exitCode);
  }

  if (error instanceof ConfigError) {
    console.error(chalk.red('Configuration error:'));
    console.error(chalk.red(`  ${error.message}`));
    process.exit(1);
  }

  if (error instanceof Error) {
    console.error(formatError(error, !isAgentError(error)));
    process.exit(1);
  }

  console.error(chalk.red('Unknown error:'), error);
  process.exit(1);
}
