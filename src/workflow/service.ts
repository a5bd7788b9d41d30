import { v4 as uuidv4 } from 'uuid';
import { config } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import type { AgentInvoker } from './agent.js';
import { WorkflowGraphBuilder } from './builder.js';
import { WorkflowEngine } from './engine.js';
import {
  WorkflowRunError,
  describeError,
  errorKindOf,
  errorTypeOf,
  isRateLimitError,
} from './errors.js';
import { getSharedRateLimiter, type RateLimiter } from './rate-limiter.js';
import { FunctionRegistry, ToolRegistry } from './registry.js';
import { parseWorkflowDefinition, parseWorkflowJson } from './schema.js';
import { ExecutionTrace } from './trace.js';
import type { ExecutionStep, WorkflowDefinitionInput, WorkflowRunResult } from './types.js';

export interface WorkflowServiceOptions {
  invoker: AgentInvoker;
  functions?: FunctionRegistry;
  tools?: ToolRegistry;
  /** Defaults to the process-wide limiter so concurrent runs share one throttle. */
  rateLimiter?: RateLimiter;
  defaultInstructions?: string;
  maxSteps?: number;
  rejectCycles?: boolean;
}

/** A typed definition, or the same document as JSON text. */
export type DefinitionSource = WorkflowDefinitionInput | string;

export interface ExecuteOptions {
  streaming?: boolean;
}

/**
 * Entry point for callers holding a workflow definition: validates it, builds
 * the graph, runs it and returns the output with the full trace. Every failure
 * surfaces as a WorkflowRunError carrying that trace.
 */
export class WorkflowService {
  readonly rateLimiter: RateLimiter;
  private builder: WorkflowGraphBuilder;
  private maxSteps: number;

  constructor(options: WorkflowServiceOptions) {
    this.rateLimiter = options.rateLimiter || getSharedRateLimiter();
    this.maxSteps = options.maxSteps ?? config.workflow.maxSteps;
    this.builder = new WorkflowGraphBuilder({
      invoker: options.invoker,
      rateLimiter: this.rateLimiter,
      functions: options.functions || new FunctionRegistry(),
      tools: options.tools || new ToolRegistry(),
      defaultInstructions: options.defaultInstructions,
      rejectCycles: options.rejectCycles,
    });
  }

  async execute(
    definition: DefinitionSource,
    inputMessage: string,
    options: ExecuteOptions = {},
  ): Promise<WorkflowRunResult> {
    if (!options.streaming) {
      return this.runTraced(definition, inputMessage, new ExecutionTrace(), false);
    }

    const events = this.stream(definition, inputMessage);
    let next = await events.next();
    while (!next.done) {
      next = await events.next();
    }
    return next.value;
  }

  stream(
    definition: DefinitionSource,
    inputMessage: string,
  ): AsyncGenerator<ExecutionStep, WorkflowRunResult, undefined> {
    const trace = new ExecutionTrace();
    return trace.follow(() => this.runTraced(definition, inputMessage, trace, true));
  }

  private async runTraced(
    definition: DefinitionSource,
    inputMessage: string,
    trace: ExecutionTrace,
    streaming: boolean,
  ): Promise<WorkflowRunResult> {
    const traceId = uuidv4();

    try {
      const parsed =
        typeof definition === 'string' ? parseWorkflowJson(definition) : parseWorkflowDefinition(definition);
      logger.info(
        `[WORKFLOW START] '${parsed.name}' | Trace ID: ${traceId} | ` +
          `Executors: ${parsed.executors.length} | Edges: ${parsed.edges.length}`
      );

      const graph = this.builder.build(parsed, trace);
      const engine = new WorkflowEngine(graph, { maxSteps: this.maxSteps });
      const { output } = await engine.run(inputMessage, { trace, streaming });

      logger.info(`[WORKFLOW SUCCESS] '${parsed.name}' | Output: ${output.length} chars | Trace ID: ${traceId}`);
      return { output, traceId, steps: trace.steps, workflowId: parsed.name };
    } catch (error) {
      throw this.toRunError(error, trace, traceId);
    }
  }

  private toRunError(error: unknown, trace: ExecutionTrace, traceId: string): WorkflowRunError {
    if (isRateLimitError(error)) {
      this.rateLimiter.recordError();
    }

    // the engine has already recorded its failure step
    if (error instanceof WorkflowRunError) {
      return new WorkflowRunError(error.message, {
        kind: error.kind,
        steps: error.steps,
        traceId,
        cause: error.cause,
      });
    }

    const message = describeError(error);
    logger.error(`[WORKFLOW ERROR] ${message} | Trace ID: ${traceId}`);
    trace.record({
      step: 'workflow_execution_failed',
      error: message,
      error_type: errorTypeOf(error),
      error_kind: errorKindOf(error),
    });
    return new WorkflowRunError(message, {
      kind: errorKindOf(error),
      steps: trace.steps,
      traceId,
      cause: error,
    });
  }
}
