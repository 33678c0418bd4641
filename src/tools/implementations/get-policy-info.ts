import { ToolDefinition, ToolHandler } from '../types';
import { PolicyService } from '../../knowledge/policy-service';

export function createGetPolicyInfoTool(policyService: PolicyService): ToolDefinition {
  const handler: ToolHandler = async (args) => {
    const result = policyService.lookup(String(args.topic ?? ''));
    return result.found ? result.text : result.message;
  };

  return {
    name: 'get_policy_info',
    version: '1.0.0',
    description:
      'Look up store policy for a topic such as returns, refunds, damaged items, shipping, lost packages or a forgotten order number.',
    inputSchema: {
      type: 'object',
      properties: {
        topic: { type: 'string', description: 'Short description of what the customer is asking about' },
      },
      required: ['topic'],
      additionalProperties: false,
    },
    handler,
  };
}
