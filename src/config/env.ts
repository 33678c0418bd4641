import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

function optionalFloat(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseFloat(val) : fallback;
}

function optionalIntList(key: string, fallback: number[]): number[] {
  const val = process.env[key];
  if (!val) return fallback;
  return val
    .split(',')
    .map((part) => parseInt(part.trim(), 10))
    .filter((n) => Number.isFinite(n));
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 3000),

  // ───── LLM Provider ─────
  gemini: {
    apiKey: optional('GEMINI_API_KEY', ''),
    model: optional('GEMINI_MODEL', 'gemini-2.5-flash-lite'),
    maxTokens: optionalInt('GEMINI_MAX_TOKENS', 2048),
    temperature: optionalFloat('GEMINI_TEMPERATURE', 0.3),
    timeoutMs: optionalInt('GEMINI_TIMEOUT_MS', 30000),
  },

  // Upstream retry policy for transient model-service failures
  llmRetry: {
    attempts: optionalInt('LLM_RETRY_ATTEMPTS', 5),
    expBase: optionalFloat('LLM_RETRY_EXP_BASE', 7),
    initialDelayMs: optionalInt('LLM_RETRY_INITIAL_DELAY_MS', 1000),
    statusCodes: optionalIntList('LLM_RETRY_STATUS_CODES', [429, 500, 503, 504]),
  },

  agent: {
    maxToolRounds: optionalInt('AGENT_MAX_TOOL_ROUNDS', 6),
  },

  // ───── Customer History (SQLite) ─────
  history: {
    dbPath: optional('HISTORY_DB_PATH', 'support_history.db'),
    busyTimeoutMs: optionalInt('HISTORY_BUSY_TIMEOUT_MS', 0),
    writeAttempts: optionalInt('HISTORY_WRITE_ATTEMPTS', 5),
    retryDelayMs: optionalInt('HISTORY_RETRY_DELAY_MS', 500),
  },
} as const;
