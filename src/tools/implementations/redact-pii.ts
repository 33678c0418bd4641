import { ToolDefinition, ToolHandler } from '../types';
import { redactPII } from '../../observability/pii-redactor';

const handler: ToolHandler = async (args) => redactPII(String(args.text ?? ''));

export const redactPiiTool: ToolDefinition = {
  name: 'redact_pii',
  version: '1.0.0',
  description:
    'Replace email addresses and phone numbers in a text with [REDACTED_EMAIL] / [REDACTED_PHONE]. ' +
    'Run this on the customer message and history before summarising or saving.',
  inputSchema: {
    type: 'object',
    properties: {
      text: { type: 'string', description: 'The text to redact' },
    },
    required: ['text'],
    additionalProperties: false,
  },
  handler,
};
