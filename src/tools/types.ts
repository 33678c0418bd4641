/** Tool definition metadata */
export interface ToolDefinition {
  name: string;
  version: string;
  description: string;
  inputSchema: ToolInputSchema;
  handler: ToolHandler;
  /** Overrides the runtime's default timeout for this tool */
  timeoutMs?: number;
}

/** JSON Schema (object form) describing a tool's named arguments */
export type ToolInputSchema = {
  type: 'object';
  properties: Record<string, { type: string; description: string }>;
  required?: string[];
  additionalProperties?: boolean;
};

/** Tool execution context */
export interface ToolContext {
  conversationId: string;
  requestId: string;
}

/**
 * Tool handler function. Handlers answer in text; an expected failure
 * (no customer, nothing found, storage error) is a returned message, not a throw.
 */
export type ToolHandler = (
  args: Record<string, unknown>,
  ctx: ToolContext,
) => Promise<string>;

/** Tool execution result */
export interface ToolResult {
  success: boolean;
  /** Text handed back to the model, for failures as well */
  output: string;
}

/** Declaration of a tool as shown to the model */
export interface ToolDeclaration {
  name: string;
  description: string;
  parameters: ToolInputSchema;
}

/** Tool call log record */
export interface ToolCallLog {
  tool: string;
  version: string;
  args: Record<string, unknown>;
  success: boolean;
  durationMs: number;
  timestamp: number;
  requestId: string;
  conversationId: string;
}
