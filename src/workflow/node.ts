import { logger } from '../utils/logger.js';
import { responseText, type AgentHandle, type AgentInvoker } from './agent.js';
import { AgentInvocationError, FunctionInvocationError } from './errors.js';
import type { RateLimiter } from './rate-limiter.js';
import type { FunctionParameters, FunctionRegistry, ToolDefinition } from './registry.js';
import type { ExecutorKind } from './types.js';

export abstract class WorkflowExecutor {
  abstract readonly kind: ExecutorKind;
  readonly name: string;

  constructor(name: string) {
    this.name = name;
  }

  abstract invoke(message: string): Promise<string>;
}

export interface AgentExecutorOptions {
  name: string;
  agentName: string;
  agentId: string;
  instructions: string;
  tools: ToolDefinition[];
  invoker: AgentInvoker;
  rateLimiter: RateLimiter;
}

export class AgentExecutor extends WorkflowExecutor {
  readonly kind = 'agent' as const;
  readonly agentName: string;
  readonly agentId: string;
  readonly instructions: string;
  readonly tools: ToolDefinition[];
  private invoker: AgentInvoker;
  private rateLimiter: RateLimiter;
  private agent: Promise<AgentHandle> | null = null;

  constructor(options: AgentExecutorOptions) {
    super(options.name);
    this.agentName = options.agentName;
    this.agentId = options.agentId;
    this.instructions = options.instructions;
    this.tools = options.tools;
    this.invoker = options.invoker;
    this.rateLimiter = options.rateLimiter;
  }

  private getAgent(): Promise<AgentHandle> {
    if (!this.agent) {
      this.agent = Promise.resolve(
        this.invoker.createAgent({
          name: this.agentName,
          id: this.agentId,
          instructions: this.instructions,
          tools: this.tools,
        })
      );
    }
    return this.agent;
  }

  async invoke(message: string): Promise<string> {
    logger.info(`[EXECUTOR START] Agent '${this.agentName}' | Input: ${message.length} chars`);

    try {
      const pending = this.getAgent();
      const agent = await pending.catch((error: unknown) => {
        // not cached: the next invocation tries again
        if (this.agent === pending) this.agent = null;
        throw error;
      });

      await this.rateLimiter.waitIfNeeded();
      logger.debug(`[RATE LIMIT] '${this.agentName}' ready to proceed`);

      logger.info(`[AGENT RUN] '${this.agentName}' calling model`);
      const result = await agent.run(message);
      const text = responseText(result) || 'OK';

      logger.info(`[AGENT SUCCESS] '${this.agentName}' | Response: ${text.length} chars`);
      return text;
    } catch (error) {
      const failure = new AgentInvocationError(this.agentName, error);
      logger.error(`[EXECUTOR ERROR] ${failure.message}`, { executor: this.name });
      throw failure;
    }
  }
}

export interface FunctionExecutorOptions {
  name: string;
  functionName: string;
  parameters?: FunctionParameters;
  registry: FunctionRegistry;
}

/**
 * Never rejects: a missing function or a thrown error becomes an `Error: ...`
 * message that flows on through the graph.
 */
export class FunctionExecutor extends WorkflowExecutor {
  readonly kind = 'function' as const;
  readonly functionName: string;
  readonly parameters: FunctionParameters;
  private registry: FunctionRegistry;

  constructor(options: FunctionExecutorOptions) {
    super(options.name);
    this.functionName = options.functionName;
    this.parameters = options.parameters || {};
    this.registry = options.registry;
  }

  async invoke(message: string): Promise<string> {
    const fn = this.registry.get(this.functionName);
    if (!fn) {
      const errorMessage = `Function '${this.functionName}' not found`;
      logger.error(errorMessage, { executor: this.name });
      return `Error: ${errorMessage}`;
    }

    try {
      const result = await fn({ ...this.parameters, input: message });
      return String(result);
    } catch (error) {
      const failure = new FunctionInvocationError(this.functionName, error);
      logger.error(failure.message, { executor: this.name });
      return `Error: ${failure.message}`;
    }
  }
}

export type Executor = AgentExecutor | FunctionExecutor;
