import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { LLMCompletionRequest, LLMCompletionResponse, LLMProvider } from '../src/llm/types';
import { AgentReply, TurnContext, TurnResponder } from '../src/agent/types';

/** Model stand-in that answers from a fixed script and records every request */
export class ScriptedProvider implements LLMProvider {
  readonly name = 'gemini' as const;
  readonly model = 'scripted-model';
  readonly requests: LLMCompletionRequest[] = [];

  constructor(private readonly script: Array<string | Error>) {}

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    this.requests.push({ ...request, messages: [...request.messages] });
    const next = this.script.shift();
    if (next === undefined) throw new Error('Scripted provider ran out of replies');
    if (next instanceof Error) throw next;
    return {
      content: next,
      model: this.model,
      provider: 'gemini',
      usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
      latencyMs: 0,
    };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

/** JSON reply in the agent response contract */
export function agentJson(
  userFacingMessage: string,
  toolCalls: Array<{ name: string; args: Record<string, unknown> }> = [],
  intent = 'support_request',
): string {
  return JSON.stringify({ user_facing_message: userFacingMessage, intent, tool_calls: toolCalls });
}

/** Responder that records prompts and answers "reply N" */
export class RecordingResponder implements TurnResponder {
  readonly prompts: string[] = [];

  async respond(message: string, _ctx: TurnContext): Promise<AgentReply> {
    this.prompts.push(message);
    return { reply: `reply ${this.prompts.length}`, intent: 'support_request', toolCalls: [], fallback: false };
  }
}

export function makeTempDir(prefix = 'support-desk-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function lockError(message = 'database is locked', code = 'SQLITE_BUSY'): Error {
  return Object.assign(new Error(message), { code });
}
