export interface PromptBundle {
  version: string;
  system: string;
  supportPlan: string;
  brandTone: string;
}

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/** A tool invocation requested by the model */
export interface ToolCallRequest {
  name: string;
  args: Record<string, unknown>;
}

/** Parsed model output for one round */
export interface AgentResponse {
  userFacingMessage: string;
  intent: string;
  toolCalls: ToolCallRequest[];
}

/** A tool call executed during a turn, with its text result */
export interface ExecutedToolCall extends ToolCallRequest {
  success: boolean;
  output: string;
}

/** Final outcome of one customer turn */
export interface AgentReply {
  reply: string;
  intent: string;
  toolCalls: ExecutedToolCall[];
  /** True when the reply is the generic apology after a failure */
  fallback: boolean;
}

/** Per-turn identifiers; no conversation state is carried between turns */
export interface TurnContext {
  conversationId: string;
  requestId: string;
}

/** Anything that can answer a customer turn (the agent, or a stand-in in tests) */
export interface TurnResponder {
  respond(message: string, ctx: TurnContext): Promise<AgentReply>;
}
