import { ToolDefinition, ToolHandler } from '../types';
import { HistoryStore } from '../../history/types';

/**
 * @param timeoutMs Runtime timeout for this tool. Set it above the store's
 *   worst-case write time so a save that is still retrying a lock is not
 *   reported as timed out and then committed anyway.
 */
export function createSaveCustomerHistoryTool(store: HistoryStore, timeoutMs?: number): ToolDefinition {
  const handler: ToolHandler = async (args) => {
    const email = typeof args.email === 'string' ? args.email : undefined;
    return store.save(email, String(args.ticket_id ?? ''), String(args.summary ?? ''));
  };

  return {
    name: 'save_customer_history',
    version: '1.0.0',
    description:
      'Save a short, PII-redacted summary of the current issue to the customer history under the ticket ID.',
    inputSchema: {
      type: 'object',
      properties: {
        email: { type: 'string', description: "The customer's email address" },
        ticket_id: { type: 'string', description: 'Ticket ID from issue_ticket' },
        summary: { type: 'string', description: 'Redacted summary of the issue and resolution' },
      },
      required: ['ticket_id', 'summary'],
      additionalProperties: false,
    },
    handler,
    timeoutMs,
  };
}
