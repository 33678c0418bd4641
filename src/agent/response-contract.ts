import { AgentResponse, ToolCallRequest } from './types';

/**
 * JSON Schema for the agent response contract.
 * The LLM is instructed to return JSON matching this schema.
 */
export const RESPONSE_CONTRACT_SCHEMA = {
  type: 'object',
  properties: {
    user_facing_message: {
      type: 'string',
      description: 'The reply to send to the customer. Leave empty while tool calls are pending.',
    },
    intent: {
      type: 'string',
      description: 'Classified intent of the customer message: chit_chat or support_request.',
    },
    tool_calls: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          name: { type: 'string' },
          args: { type: 'object', additionalProperties: true },
        },
        required: ['name', 'args'],
      },
      description: 'Tool calls to execute before the next round. Empty when the reply is final.',
    },
  },
  required: ['user_facing_message', 'intent', 'tool_calls'],
} as const;

/**
 * Parse the LLM response into a typed AgentResponse.
 * Handles clean JSON and markdown-wrapped JSON; a reply that is not JSON at all
 * is taken as the final message.
 */
export function parseAgentResponse(raw: string): AgentResponse {
  let jsonStr = raw.trim();

  // Strip markdown code fences if present
  if (jsonStr.startsWith('```')) {
    jsonStr = jsonStr.replace(/^```(?:json)?\s*/, '').replace(/\s*```$/, '');
  }

  if (!jsonStr.startsWith('{')) {
    return { userFacingMessage: jsonStr, intent: 'unknown', toolCalls: [] };
  }

  const parsed: unknown = JSON.parse(jsonStr);
  if (!isRecord(parsed)) {
    throw new Error('Agent response is not a JSON object');
  }

  return {
    userFacingMessage: typeof parsed.user_facing_message === 'string' ? parsed.user_facing_message : '',
    intent: typeof parsed.intent === 'string' ? parsed.intent : 'unknown',
    toolCalls: Array.isArray(parsed.tool_calls) ? parseToolCalls(parsed.tool_calls) : [],
  };
}

function parseToolCalls(items: unknown[]): ToolCallRequest[] {
  return items.filter(isRecord).flatMap((tc) =>
    typeof tc.name === 'string'
      ? [{
          // Strip "functions." prefix if the model adds it (function calling artifact)
          name: tc.name.replace(/^functions\./, ''),
          args: isRecord(tc.args) ? tc.args : {},
        }]
      : [],
  );
}

/** Trim the final reply and drop quotes the model wrapped around all of it */
export function cleanReplyText(text: string): string {
  const trimmed = text.trim();
  for (const quote of ['"""', '"', "'"]) {
    if (trimmed.length >= quote.length * 2 && trimmed.startsWith(quote) && trimmed.endsWith(quote)) {
      return trimmed.slice(quote.length, -quote.length).trim();
    }
  }
  return trimmed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
