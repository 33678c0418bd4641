import { LLMMessage } from '../agent/types';

export type LLMProviderName = 'gemini';

/** Connection and sampling settings for the model service */
export interface LLMProviderConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  /** Per-request timeout handed to the SDK */
  timeoutMs: number;
}

/**
 * Upstream retry policy for transient model-service failures.
 * Retry n (1-based) waits `initialDelayMs * expBase^(n-1)`.
 */
export interface LLMRetryPolicy {
  /** Total attempts, including the first */
  attempts: number;
  expBase: number;
  initialDelayMs: number;
  /** HTTP statuses worth another attempt */
  statusCodes: number[];
}

export interface LLMCompletionRequest {
  messages: LLMMessage[];
  temperature: number;
  maxTokens: number;
  /** Ask for a JSON document instead of free text */
  jsonMode: boolean;
}

export interface LLMTokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LLMCompletionResponse {
  /** Model text; a JSON document when the request set jsonMode */
  content: string;
  model: string;
  provider: LLMProviderName;
  usage: LLMTokenUsage;
  latencyMs: number;
}

/**
 * The reasoning collaborator behind the agent.
 * Tests substitute a scripted implementation.
 */
export interface LLMProvider {
  readonly name: LLMProviderName;
  readonly model: string;

  complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse>;

  /** True when the model service answers a trivial request */
  healthCheck(): Promise<boolean>;
}
