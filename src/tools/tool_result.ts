// src/tools/tool_result.ts
import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { logger } from '../utils/logger.js';
import { AppError } from '../utils/errors.js';

export interface ToolResult {
  [key: string]: unknown;
  content: { type: 'text'; text: string }[];
  isError?: boolean;
}

export function jsonResult(value: unknown): ToolResult {
  return { content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }] };
}

function structuredError(error: AppError): ToolResult {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify({ error: error.toJSON() }, null, 2) }],
    isError: true,
  };
}

/** Analysis tools never throw: every failure becomes a structured error result. */
export function analysisErrorResult(toolName: string, error: unknown): ToolResult {
  logger.error({ err: error }, `[${toolName}] Error processing request`);
  if (error instanceof AppError) {
    return structuredError(error);
  }
  const message = error instanceof Error ? error.message : String(error);
  return {
    content: [
      { type: 'text' as const, text: JSON.stringify({ error: { code: 'InternalError', message } }, null, 2) },
    ],
    isError: true,
  };
}

/** Mutating tools report domain errors as results and rethrow anything unexpected. */
export function mutationErrorResult(toolName: string, error: unknown): ToolResult {
  logger.error({ err: error }, `[${toolName}] Error processing request`);
  if (error instanceof AppError) {
    return structuredError(error);
  }
  const message = error instanceof Error ? error.message : 'An unknown error occurred';
  throw new McpError(ErrorCode.InternalError, message);
}
