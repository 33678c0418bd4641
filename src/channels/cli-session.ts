import * as readline from 'node:readline';
import { v4 as uuidv4 } from 'uuid';
import { TurnResponder } from '../agent/types';
import { APOLOGY_REPLY } from '../agent/agent-core';
import { buildTurnPrompt, isValidEmailInput } from './turn-prompt';
import { logger } from '../observability/logger';

export const EXIT_KEYWORD = 'quit';

/**
 * Line-based chat in a terminal.
 *
 * Collects a name and a valid email once, then relays each line to the agent
 * as its own turn until the exit keyword or end of input.
 */
export class CliSession {
  private log = logger.child({ component: 'cli-session' });

  constructor(
    private readonly agent: TurnResponder,
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {}

  async run(): Promise<void> {
    const rl = readline.createInterface({ input: this.input, terminal: false });
    const lines = rl[Symbol.asyncIterator]();

    const ask = async (prompt: string): Promise<string | undefined> => {
      this.output.write(prompt);
      const next = await lines.next();
      return next.done ? undefined : next.value.trim();
    };

    try {
      this.output.write('Welcome! Please enter your information to begin\n');

      const name = await ask('Your Name: ');
      if (name === undefined) return;

      let email = await ask('Your Email: ');
      while (email !== undefined && !isValidEmailInput(email)) {
        this.output.write('Please enter a valid email address\n');
        email = await ask('Your Email: ');
      }
      if (email === undefined) return;

      this.output.write(`\nChat started. Type '${EXIT_KEYWORD}' to exit.\n`);

      const conversationId = `cli-${uuidv4()}`;
      let firstTurn = true;

      for (;;) {
        const line = await ask('\nYou: ');
        if (line === undefined || line.toLowerCase() === EXIT_KEYWORD) break;
        if (!line) continue;

        const prompt = buildTurnPrompt(line, { name, email }, firstTurn);
        firstTurn = false;

        const reply = await this.relay(prompt, conversationId);
        this.output.write(`Assistant: ${reply}\n`);
      }
    } finally {
      rl.close();
    }
  }

  private async relay(prompt: string, conversationId: string): Promise<string> {
    try {
      const result = await this.agent.respond(prompt, { conversationId, requestId: uuidv4() });
      return result.reply;
    } catch (err) {
      this.log.error({ err, conversationId }, 'Chat turn failed');
      return APOLOGY_REPLY;
    }
  }
}
