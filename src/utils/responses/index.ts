import type { ToolResponse } from '../../types/common.ts';

/**
 * Error response with an optional details block appended to the message.
 */
export function createErrorResponse(message: string, details?: string): ToolResponse {
  const detailText = details ? `\nDetails: ${details}` : '';
  return {
    content: [
      {
        type: 'text',
        text: `Error: ${message}${detailText}`,
      },
    ],
    isError: true,
  };
}
