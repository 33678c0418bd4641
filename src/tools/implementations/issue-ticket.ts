import { ToolDefinition, ToolHandler } from '../types';
import { issueTicketId } from '../../ticketing/ticket-issuer';
import { logger } from '../../observability/logger';

const handler: ToolHandler = async (_args, ctx) => {
  const ticketId = issueTicketId();
  logger.child({ tool: 'issue_ticket', conversationId: ctx.conversationId }).info({ ticketId }, 'Ticket issued');
  return ticketId;
};

export const issueTicketTool: ToolDefinition = {
  name: 'issue_ticket',
  version: '1.0.0',
  description: 'Generate a new, unique support ticket ID for this interaction.',
  inputSchema: {
    type: 'object',
    properties: {},
    additionalProperties: false,
  },
  handler,
};
