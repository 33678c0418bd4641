import { AgentReply, ExecutedToolCall, LLMMessage, PromptBundle, TurnContext, TurnResponder } from './types';
import { PromptManager } from './prompt-manager';
import { cleanReplyText, parseAgentResponse, RESPONSE_CONTRACT_SCHEMA } from './response-contract';
import { LLMProvider } from '../llm/types';
import { ToolRegistry } from '../tools/registry';
import { ToolRuntime } from '../tools/runtime';
import { childLogger } from '../observability/logger';

export const EMPTY_REPLY = "I'm sorry, I couldn't process your request. How can I assist you?";
export const APOLOGY_REPLY =
  "I'm sorry, something went wrong on our side. Please try again, or tell me a bit more about what you need.";

export interface SupportAgentOptions {
  /** Rounds of tool execution allowed before the model must answer */
  maxToolRounds: number;
  temperature: number;
  maxTokens: number;
}

/**
 * SupportAgent: runs one customer turn against the model.
 *
 * Each turn starts from a fresh message list (system prompt + the customer
 * message). The model answers in the JSON response contract; requested tool
 * calls go through the ToolRuntime and their text results are fed back until
 * the model returns a final message or the round limit is reached.
 */
export class SupportAgent implements TurnResponder {
  constructor(
    private readonly provider: LLMProvider,
    private readonly registry: ToolRegistry,
    private readonly runtime: ToolRuntime,
    private readonly prompts: PromptManager,
    private readonly options: SupportAgentOptions,
  ) {}

  async respond(message: string, ctx: TurnContext): Promise<AgentReply> {
    const log = childLogger(ctx.requestId, { component: 'support-agent', conversationId: ctx.conversationId });
    const executed: ExecutedToolCall[] = [];

    try {
      const messages: LLMMessage[] = [
        { role: 'system', content: this.buildSystemPrompt(this.prompts.get()) },
        { role: 'user', content: message },
      ];

      for (let round = 1; ; round++) {
        const completion = await this.provider.complete({
          messages,
          temperature: this.options.temperature,
          maxTokens: this.options.maxTokens,
          jsonMode: true,
        });
        const response = parseAgentResponse(completion.content);

        const limitReached = round > this.options.maxToolRounds;
        if (response.toolCalls.length === 0 || limitReached) {
          if (limitReached && response.toolCalls.length > 0) {
            log.warn({ pending: response.toolCalls.length }, 'Tool round limit reached; ignoring further tool calls');
          }
          const reply = cleanReplyText(response.userFacingMessage);
          log.info({
            intent: response.intent,
            rounds: round,
            toolCallCount: executed.length,
            model: completion.model,
            latencyMs: completion.latencyMs,
          }, 'Agent reply generated');
          return { reply: reply || EMPTY_REPLY, intent: response.intent, toolCalls: executed, fallback: false };
        }

        messages.push({ role: 'assistant', content: completion.content });

        const results: ExecutedToolCall[] = [];
        for (const call of response.toolCalls) {
          const result = await this.runtime.execute(call.name, call.args, ctx);
          results.push({ ...call, ...result });
        }
        executed.push(...results);

        messages.push({ role: 'user', content: formatToolResults(results) });
      }
    } catch (err) {
      log.error({ err }, 'Turn processing failed');
      return { reply: APOLOGY_REPLY, intent: 'unknown', toolCalls: executed, fallback: true };
    }
  }

  async healthCheck(): Promise<boolean> {
    return this.provider.healthCheck();
  }

  private buildSystemPrompt(prompts: PromptBundle): string {
    return [
      prompts.system,
      '',
      prompts.supportPlan ? `--- SUPPORT PLAN ---\n${prompts.supportPlan}` : '',
      '',
      prompts.brandTone ? `--- BRAND TONE ---\n${prompts.brandTone}` : '',
      '',
      '--- RESPONSE FORMAT ---',
      'You MUST respond with a JSON object matching this schema:',
      JSON.stringify(RESPONSE_CONTRACT_SCHEMA, null, 2),
      '',
      '--- AVAILABLE TOOLS ---',
      ...this.registry.getToolDeclarations().map((t) =>
        `- ${t.name}: ${t.description}\n  Input: ${JSON.stringify(t.parameters)}`,
      ),
    ].filter(Boolean).join('\n');
  }
}

/** Tool results message sent back to the model after a round of tool calls */
export function formatToolResults(results: ExecutedToolCall[]): string {
  const payload = results.map((r) => ({ name: r.name, success: r.success, output: r.output }));
  return `TOOL RESULTS:\n${JSON.stringify(payload, null, 2)}`;
}
