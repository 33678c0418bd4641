import Ajv, { ValidateFunction } from 'ajv';
import type { Logger } from 'pino';
import { ToolRegistry } from './registry';
import { ToolContext, ToolResult, ToolCallLog, ToolDefinition } from './types';
import { logger } from '../observability/logger';
import { redactObject } from '../observability/pii-redactor';

const ajv = new Ajv({ allErrors: true, coerceTypes: true });

export const DEFAULT_TOOL_TIMEOUT_MS = 15_000;

class ToolTimeoutError extends Error {
  constructor(toolName: string, timeoutMs: number) {
    super(`Tool ${toolName} did not finish within ${timeoutMs}ms`);
    this.name = 'ToolTimeoutError';
  }
}

export interface ToolRuntimeOptions {
  timeoutMs?: number;
}

/**
 * Executes tool calls requested by the model.
 *
 * `execute` never throws: unknown tools, invalid arguments, handler failures
 * and timeouts all come back as a failed result carrying an `Error: ...` text,
 * so the model always receives a string.
 */
export class ToolRuntime {
  private validators: Map<string, ValidateFunction> = new Map();
  private timeoutMs: number;

  constructor(
    private readonly registry: ToolRegistry,
    options: ToolRuntimeOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
  }

  async execute(
    toolName: string,
    args: Record<string, unknown>,
    ctx: ToolContext,
  ): Promise<ToolResult> {
    const startTime = Date.now();
    const log = logger.child({
      tool: toolName,
      requestId: ctx.requestId,
      conversationId: ctx.conversationId,
    });

    // 1. Check tool exists
    const tool = this.registry.get(toolName);
    if (!tool) {
      log.warn('Tool not found in registry');
      return { success: false, output: `Error: Unknown tool: ${toolName}` };
    }

    // 2. Schema validation
    let validate: ValidateFunction;
    try {
      validate = this.getValidator(tool);
    } catch (err) {
      log.error({ err }, 'Schema compilation error');
      return { success: false, output: 'Error: Internal validation error' };
    }
    if (!validate(args)) {
      const errors = validate.errors?.map((e) => `${e.instancePath} ${e.message}`.trim()).join('; ');
      log.warn({ errors }, 'Tool input schema validation failed');
      return { success: false, output: `Error: Invalid input: ${errors}` };
    }

    // 3. Execute with timeout
    const result = await this.tryExecute(tool, args, ctx, log);

    // 4. Log and return
    this.logToolCall(tool, args, result, Date.now() - startTime, ctx);
    return result;
  }

  private getValidator(tool: ToolDefinition): ValidateFunction {
    let validate = this.validators.get(tool.name);
    if (!validate) {
      validate = ajv.compile(tool.inputSchema);
      this.validators.set(tool.name, validate);
    }
    return validate;
  }

  /**
   * Execute once under the tool's own timeout, or the runtime default.
   * The timer is armed before the handler starts so synchronous work counts.
   */
  private async tryExecute(
    tool: ToolDefinition,
    args: Record<string, unknown>,
    ctx: ToolContext,
    log: Logger,
  ): Promise<ToolResult> {
    const timeoutMs = tool.timeoutMs ?? this.timeoutMs;
    let timer: NodeJS.Timeout | undefined;
    try {
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new ToolTimeoutError(tool.name, timeoutMs)), timeoutMs);
      });
      const output = await Promise.race([tool.handler(args, ctx), timeout]);
      return { success: true, output };
    } catch (err) {
      const safeError = err instanceof ToolTimeoutError
        ? 'Error: Tool execution timed out'
        : 'Error: Tool execution failed';

      log.error({ err, timeoutMs }, 'Tool execution failed');
      return { success: false, output: safeError };
    } finally {
      clearTimeout(timer);
    }
  }

  private logToolCall(
    tool: ToolDefinition,
    args: Record<string, unknown>,
    result: ToolResult,
    durationMs: number,
    ctx: ToolContext,
  ): void {
    const logEntry: ToolCallLog = {
      tool: tool.name,
      version: tool.version,
      args: redactObject(args),
      success: result.success,
      durationMs,
      timestamp: Date.now(),
      requestId: ctx.requestId,
      conversationId: ctx.conversationId,
    };

    logger.info({ toolCallLog: logEntry }, 'Tool call completed');
  }
}
