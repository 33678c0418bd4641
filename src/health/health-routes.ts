import { FastifyInstance } from 'fastify';
import { HistoryStore } from '../history/types';
import { logger } from '../observability/logger';

export interface HealthCheckable {
  healthCheck(): Promise<boolean>;
}

type CheckStatus = 'ok' | 'error' | 'skipped';

interface CheckResult {
  status: CheckStatus;
  latencyMs?: number;
}

async function runCheck(name: string, check: () => boolean | Promise<boolean>): Promise<CheckResult> {
  const start = Date.now();
  let healthy: boolean;
  try {
    healthy = await check();
  } catch (err) {
    logger.warn({ err, check: name }, 'Readiness check threw');
    healthy = false;
  }
  return { status: healthy ? 'ok' : 'error', latencyMs: Date.now() - start };
}

export function registerHealthRoutes(app: FastifyInstance, historyStore: HistoryStore, agent?: HealthCheckable): void {
  /** Liveness: the process is up */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /** Readiness: the history file answers a query and the model service responds */
  app.get('/ready', async (_req, reply) => {
    const checks: Record<string, CheckResult> = {
      history_store: await runCheck('history_store', () => historyStore.ping()),
      llm: agent ? await runCheck('llm', () => agent.healthCheck()) : { status: 'skipped' },
    };

    const ready = Object.values(checks).every((c) => c.status !== 'error');
    return reply.status(ready ? 200 : 503).send({
      status: ready ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString(),
    });
  });
}
