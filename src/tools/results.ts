import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { describeError } from '../utils/index.js';

export function jsonResult(value: unknown): CallToolResult {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }],
  };
}

export function errorResult(err: unknown): CallToolResult {
  return {
    content: [{ type: 'text' as const, text: `Error: ${describeError(err)}` }],
    isError: true,
  };
}
