/**
 * Shared types for tool responses.
 */

export type TextContent = {
  type: 'text';
  text: string;
};

export type ToolResponse = {
  content: TextContent[];
  isError?: boolean;
};
