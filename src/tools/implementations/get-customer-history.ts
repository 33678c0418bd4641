import { ToolDefinition, ToolHandler } from '../types';
import { HistoryStore } from '../../history/types';
import { logger } from '../../observability/logger';

export function createGetCustomerHistoryTool(store: HistoryStore): ToolDefinition {
  const handler: ToolHandler = async (args, ctx) => {
    const email = typeof args.email === 'string' ? args.email : undefined;
    logger.child({ tool: 'get_customer_history', conversationId: ctx.conversationId }).debug('Looking up customer history');
    return store.lookup(email);
  };

  return {
    name: 'get_customer_history',
    version: '1.0.0',
    description: "Retrieve the customer's past support history, oldest first, by email address.",
    inputSchema: {
      type: 'object',
      properties: {
        email: { type: 'string', description: "The customer's email address" },
      },
      additionalProperties: false,
    },
    handler,
  };
}
