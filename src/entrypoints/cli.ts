#!/usr/bin/env tsx
/**
 * CLI entry point for task-agent.
 *
 * This file defines the command-line interface using Commander.js.
 *
 * Usage:
 * - task-agent <payload.json>       - Run the task described by a payload file
 * - task-agent --json '<payload>'   - Run an inline JSON payload
 */

import 'dotenv/config';
import { Command } from 'commander';
import { runCommand } from '../cli/commands/run.ts';
import { handleError } from '../cli/formatters/output.ts';
import { CLIENT_VERSION } from '../common/index.ts';

const program = new Command();

const controller = new AbortController();
process.once('SIGINT', () => controller.abort());

program
  .name('task-agent')
  .description('Run one task against a language model with tools from MCP servers')
  .version(CLIENT_VERSION)
  .argument('[payload]', 'Path to a JSON run payload')
  .option('--json <payload>', 'Inline JSON run payload')
  .option('--raw', 'Print only the result JSON')
  .option('-v, --verbose', 'Print tool calls as they happen and debug logs')
  .action(async (payload: string | undefined, options: { json?: string; raw?: boolean; verbose?: boolean }) => {
    await runCommand(payload, options, { abortSignal: controller.signal });
  });

// Global error handlers
process.on('uncaughtException', (error) => {
  handleError(error);
});

process.on('unhandledRejection', (reason) => {
  handleError(reason);
});

program.parseAsync().catch(handleError);
