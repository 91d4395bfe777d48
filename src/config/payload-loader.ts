/**
 * Run payload loader.
 *
 * Reads a run payload from an inline JSON string or a JSON file and
 * validates it against RunPayloadSchema. Every failure (unreadable file,
 * invalid JSON, schema violation) surfaces as a ConfigError.
 *
 * Core exports:
 * - parseRunPayload: validate an already-parsed value
 * - loadRunPayloadFromJson: parse and validate a JSON string
 * - loadRunPayloadFromFile: read, parse and validate a JSON file
 * - formatIssues: render zod issues as `path: message` lines
 */

import * as fs from 'node:fs';
import type { ZodIssue } from 'zod';
import { ConfigError, getErrorMessage } from '../common/index.ts';
import { RunPayloadSchema, type RunPayload } from './run-payload-schema.ts';

/**
 * Render zod issues as `path: message` lines.
 */
export function formatIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

export function parseRunPayload(raw: unknown): RunPayload {
  const result = RunPayloadSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error.issues);
    throw new ConfigError(`Invalid run payload:\n  - ${issues.join('\n  - ')}`, issues);
  }
  return result.data;
}

export function loadRunPayloadFromJson(json: string): RunPayload {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new ConfigError(`Run payload is not valid JSON: ${getErrorMessage(error)}`, [], { cause: error });
  }
  return parseRunPayload(raw);
}

export async function loadRunPayloadFromFile(filePath: string): Promise<RunPayload> {
  let json: string;
  try {
    json = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    const message = isNotFound(error)
      ? `File not found: ${filePath}`
      : `Cannot read run payload ${filePath}: ${getErrorMessage(error)}`;
    throw new ConfigError(message, [], { cause: error });
  }
  return loadRunPayloadFromJson(json);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
