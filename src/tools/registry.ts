import { ToolDeclaration, ToolDefinition } from './types';
import { logger } from '../observability/logger';
import { HistoryStore } from '../history/types';
import { PolicyService } from '../knowledge/policy-service';

import { issueTicketTool } from './implementations/issue-ticket';
import { redactPiiTool } from './implementations/redact-pii';
import { createGetPolicyInfoTool } from './implementations/get-policy-info';
import { createGetCustomerHistoryTool } from './implementations/get-customer-history';
import { createSaveCustomerHistoryTool } from './implementations/save-customer-history';

export class ToolRegistry {
  private tools: Map<string, ToolDefinition> = new Map();

  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      logger.warn({ tool: tool.name }, 'Overwriting existing tool registration');
    }
    this.tools.set(tool.name, tool);
    logger.debug({ tool: tool.name, version: tool.version }, 'Tool registered');
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  getAll(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** Tool declarations in the name / description / parameters shape models expect */
  getToolDeclarations(): ToolDeclaration[] {
    return this.getAll().map((t) => ({
      name: t.name,
      description: t.description,
      parameters: t.inputSchema,
    }));
  }
}

export interface SupportToolDeps {
  historyStore: HistoryStore;
  policyService: PolicyService;
  /** Runtime timeout for save_customer_history; defaults to the runtime's */
  saveTimeoutMs?: number;
}

/** Register the five support-desk tools */
export function registerSupportTools(registry: ToolRegistry, deps: SupportToolDeps): ToolRegistry {
  registry.register(issueTicketTool);
  registry.register(createGetCustomerHistoryTool(deps.historyStore));
  registry.register(createGetPolicyInfoTool(deps.policyService));
  registry.register(redactPiiTool);
  registry.register(createSaveCustomerHistoryTool(deps.historyStore, deps.saveTimeoutMs));

  logger.info({ count: registry.getAll().length }, 'Support tools registered');
  return registry;
}
