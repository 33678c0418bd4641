import { buildApp } from './app';
import { env } from './config/env';
import { logger } from './observability/logger';

async function main(): Promise<void> {
  const { app, registry } = await buildApp();

  // app.close() runs the onClose hook, which releases the history file
  let stopping = false;
  const stop = async (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'Shutting down');
    await app.close();
    process.exit(0);
  };
  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => void stop(signal));
  }

  await app.listen({ port: env.port, host: '0.0.0.0' });
  logger.info(
    { port: env.port, env: env.nodeEnv, model: env.gemini.model, tools: registry.getAll().length },
    'Support desk assistant listening',
  );
}

main().catch((err) => {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
