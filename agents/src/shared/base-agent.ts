/**
 * Base agent class: schema-checked input and output, per-run logs, and a
 * result object that never throws. The thrown value survives as `cause`.
 */

import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import { writeLog } from '@folioforge/core';
import type { Agent, AgentConfig, AgentContext, AgentResult, AgentLog } from './types.js';

/** `path: message` for each issue, joined on one line. */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export class AgentValidationError extends Error {
  constructor(
    readonly agent: string,
    readonly phase: 'input' | 'output',
    zodError: ZodError,
  ) {
    super(`${agent} received invalid ${phase}: ${formatZodIssues(zodError)}`, { cause: zodError });
    this.name = 'AgentValidationError';
  }
}

export abstract class BaseAgent<TInput, TOutput> implements Agent<TInput, TOutput> {
  abstract config: AgentConfig;
  abstract inputSchema: ZodType<TInput, ZodTypeDef, unknown>;
  abstract outputSchema: ZodType<TOutput, ZodTypeDef, unknown>;

  protected logs: AgentLog[] = [];

  protected log(level: AgentLog['level'], message: string, data?: unknown): void {
    this.logs.push({ timestamp: new Date(), level, message, data });
    writeLog(this.config.name, level, message, data);
  }

  protected debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  protected info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  protected warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  protected error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  async execute(input: TInput, context?: Partial<AgentContext>): Promise<AgentResult<TOutput>> {
    const started = Date.now();
    const fullContext: AgentContext = { timestamp: new Date(), ...context };
    this.logs = [];
    this.debug('Starting execution', fullContext.runId ? { runId: fullContext.runId } : undefined);

    try {
      const parsedInput = this.validate(this.inputSchema, input, 'input');
      const output = this.validate(this.outputSchema, await this.run(parsedInput, fullContext), 'output');

      const duration = Date.now() - started;
      this.info('Completed successfully', { duration });
      return { success: true, data: output, duration, context: fullContext };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.error(`Execution failed: ${message}`);
      return {
        success: false,
        error: message,
        cause: err,
        duration: Date.now() - started,
        context: fullContext,
      };
    }
  }

  private validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown, phase: 'input' | 'output'): T {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      throw new AgentValidationError(this.config.name, phase, parsed.error);
    }
    return parsed.data;
  }

  /** The agent's own work; input is already validated. */
  protected abstract run(input: TInput, context: AgentContext): Promise<TOutput>;

  /** Logs of the most recent execution. */
  getLogs(): AgentLog[] {
    return [...this.logs];
  }
}

/**
 * Return the agent's data or rethrow what made it fail.
 */
export function unwrapAgentResult<T>(result: AgentResult<T>): T {
  if (result.success && result.data !== undefined) {
    return result.data;
  }
  if (result.cause !== undefined) {
    throw result.cause;
  }
  throw new Error(result.error ?? 'Agent returned no data');
}
