import type { TextContent } from '@modelcontextprotocol/sdk/types.js';
import { logger } from './logger.ts';
import { CsvChatError } from './errors.ts';

export type ToolResult = { content: TextContent[]; isError?: boolean };

export function withToolErrorHandler<TArgs extends unknown[]>(
  toolName: string,
  fn: (...args: TArgs) => Promise<ToolResult>,
): (...args: TArgs) => Promise<ToolResult> {
  return async (...args: TArgs): Promise<ToolResult> => {
    try {
      return await fn(...args);
    } catch (error) {
      logger.error(
        {
          tool: toolName,
          code: error instanceof CsvChatError ? error.code : undefined,
          error: error instanceof Error ? error.message : String(error),
        },
        'Tool execution failed',
      );

      const message = error instanceof CsvChatError
        ? `Error: ${error.message}`
        : `Unexpected error: ${error instanceof Error ? error.message : String(error)}`;

      return {
        content: [{ type: 'text', text: message }],
        isError: true,
      };
    }
  };
}
