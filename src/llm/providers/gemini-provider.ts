import { Content, GenerateContentResponse, GoogleGenerativeAI } from '@google/generative-ai';
import type { Logger } from 'pino';
import {
  LLMCompletionRequest,
  LLMCompletionResponse,
  LLMProvider,
  LLMProviderConfig,
  LLMRetryPolicy,
  LLMTokenUsage,
} from '../types';
import { withLLMRetry } from '../retry-policy';
import { LLMMessage } from '../../agent/types';
import { logger } from '../../observability/logger';

const CONVERSATION_START = '(conversation start)';

export interface GeminiRequestParts {
  systemInstruction?: string;
  contents: Content[];
}

/**
 * Split our message list into Gemini's shape: system text becomes the
 * systemInstruction, 'assistant' turns become 'model' turns, and runs of the
 * same role collapse into one turn with several parts. Gemini rejects a
 * conversation that does not open with a user turn, so one is inserted.
 */
export function toGeminiRequest(messages: LLMMessage[]): GeminiRequestParts {
  const system = messages.filter((m) => m.role === 'system').map((m) => m.content);
  const contents: Content[] = [];

  for (const msg of messages) {
    if (msg.role === 'system') continue;
    const role = msg.role === 'assistant' ? 'model' : 'user';
    const previous = contents.at(-1);
    if (previous?.role === role) {
      previous.parts.push({ text: msg.content });
    } else {
      contents.push({ role, parts: [{ text: msg.content }] });
    }
  }

  if (contents.length > 0 && contents[0].role !== 'user') {
    contents.unshift({ role: 'user', parts: [{ text: CONVERSATION_START }] });
  }

  return {
    systemInstruction: system.length > 0 ? system.join('\n\n') : undefined,
    contents,
  };
}

function toUsage(response: GenerateContentResponse): LLMTokenUsage {
  const meta = response.usageMetadata;
  return {
    promptTokens: meta?.promptTokenCount ?? 0,
    completionTokens: meta?.candidatesTokenCount ?? 0,
    totalTokens: meta?.totalTokenCount ?? 0,
  };
}

/** Google Gemini adapter with upstream retry on transient HTTP statuses. */
export class GeminiProvider implements LLMProvider {
  readonly name = 'gemini' as const;
  readonly model: string;
  private readonly client: GoogleGenerativeAI;
  private readonly log: Logger = logger.child({ component: 'gemini-provider' });

  constructor(
    private readonly config: LLMProviderConfig,
    private readonly retryPolicy: LLMRetryPolicy,
  ) {
    this.model = config.model;
    this.client = new GoogleGenerativeAI(config.apiKey);
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const startedAt = Date.now();
    const { systemInstruction, contents } = toGeminiRequest(request.messages);

    const generativeModel = this.client.getGenerativeModel(
      {
        model: this.model,
        systemInstruction,
        generationConfig: {
          temperature: request.temperature,
          maxOutputTokens: request.maxTokens,
          ...(request.jsonMode ? { responseMimeType: 'application/json' } : {}),
        },
      },
      { timeout: this.config.timeoutMs },
    );

    const { response } = await withLLMRetry(
      () => generativeModel.generateContent({ contents }),
      this.retryPolicy,
      this.log,
    );

    const content = response.text();
    if (!content) {
      throw new Error('Gemini returned empty response');
    }

    return {
      content,
      model: this.model,
      provider: this.name,
      usage: toUsage(response),
      latencyMs: Date.now() - startedAt,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const result = await this.client.getGenerativeModel({ model: this.model }).generateContent('ping');
      return result.response.text().length > 0;
    } catch (err) {
      this.log.warn({ err }, 'Gemini health check failed');
      return false;
    }
  }
}
