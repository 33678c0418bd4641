#!/usr/bin/env node
import { buildAssistant } from './app';
import { CliSession } from './channels/cli-session';
import { logger } from './observability/logger';

async function main(): Promise<void> {
  // Keep tool-call logs out of the conversation unless asked for
  if (!process.env.LOG_LEVEL) {
    logger.level = 'warn';
  }

  const { agent, historyStore } = buildAssistant();
  try {
    await new CliSession(agent).run();
  } finally {
    historyStore.close();
  }
}

main().catch((err) => {
  logger.fatal({ err }, 'Chat session failed');
  process.exit(1);
});
