// pattern: Functional Core

import type { ToolResult } from './types.ts';

export function textResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }], isError: false };
}

export function errorResult(message: string): ToolResult {
  return { content: [{ type: 'text', text: message }], isError: true };
}

/**
 * Concatenated text of a result's content blocks.
 */
export function resultText(result: ToolResult): string {
  return result.content.map((block) => block.text).join('\n');
}
