import * as fs from 'fs';
import * as path from 'path';
import { PromptBundle } from './types';
import { logger } from '../observability/logger';

// Resolve from project root (2 levels up from dist/agent/ or src/agent/)
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
export const PROMPTS_DIR = path.resolve(PROJECT_ROOT, 'prompts');

const FALLBACK_SYSTEM_PROMPT = 'You are a helpful customer support assistant.';

export class PromptManager {
  private bundle: PromptBundle;

  constructor(private readonly promptsDir: string = PROMPTS_DIR) {
    this.bundle = this.load();
  }

  load(): PromptBundle {
    const bundle: PromptBundle = {
      version: 'v1',
      system: this.readPromptFile('system.md') || FALLBACK_SYSTEM_PROMPT,
      supportPlan: this.readPromptFile('support-plan.md'),
      brandTone: this.readPromptFile('brand_tone.md'),
    };
    logger.info({ version: bundle.version, promptsDir: this.promptsDir }, 'Loaded prompt bundle');
    return bundle;
  }

  get(): PromptBundle {
    return this.bundle;
  }

  private readPromptFile(filename: string): string {
    const filepath = path.join(this.promptsDir, filename);
    if (!fs.existsSync(filepath)) {
      logger.warn({ filepath }, 'Prompt file not found');
      return '';
    }
    return fs.readFileSync(filepath, 'utf-8').trim();
  }
}
