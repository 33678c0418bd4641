import { FastifyInstance } from 'fastify';
import { v4 as uuidv4 } from 'uuid';
import { TurnResponder } from '../agent/types';
import { buildTurnPrompt } from './turn-prompt';
import { logger } from '../observability/logger';

interface ChatBody {
  message: string;
  name?: string;
  email?: string;
  conversation_id?: string;
}

const CHAT_BODY_SCHEMA = {
  type: 'object',
  properties: {
    message: { type: 'string' },
    name: { type: 'string' },
    email: { type: 'string' },
    conversation_id: { type: 'string' },
  },
  required: ['message'],
} as const;

/**
 * Synchronous chat endpoint.
 * POST /chat
 *
 * Each request is one stateless turn: the customer's name and email travel
 * with the message and are restated in the prompt.
 */
export function registerChatEndpoint(app: FastifyInstance, agent: TurnResponder): void {
  app.post<{ Body: ChatBody }>('/chat', { schema: { body: CHAT_BODY_SCHEMA } }, async (req, reply) => {
    const log = logger.child({ component: 'chat-endpoint' });

    const message = req.body.message.trim();
    if (!message) {
      return reply.status(400).send({ error: 'message is required' });
    }

    const requestId = uuidv4();
    const conversationId = req.body.conversation_id ?? `chat-${requestId}`;
    const prompt = buildTurnPrompt(
      message,
      { name: req.body.name?.trim(), email: req.body.email?.trim() },
      true,
    );

    const result = await agent.respond(prompt, { conversationId, requestId });
    log.info(
      { requestId, conversationId, intent: result.intent, toolCalls: result.toolCalls.length, fallback: result.fallback },
      'Chat turn completed',
    );

    return reply.send({
      reply: result.reply,
      requestId,
      conversationId,
    });
  });
}
