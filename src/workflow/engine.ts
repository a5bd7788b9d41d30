import { config } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { evaluateCondition } from './condition.js';
import {
  AgentInvocationError,
  WorkflowLimitError,
  WorkflowRunError,
  describeError,
  errorKindOf,
  errorTypeOf,
} from './errors.js';
import type { CompiledEdge, CompiledGraph } from './graph.js';
import { ExecutionTrace } from './trace.js';
import type { ExecutionStep, WorkflowOutput } from './types.js';

export interface WorkflowEngineOptions {
  /** Upper bound on executor dispatches per run; keeps cyclic graphs finite. */
  maxSteps?: number;
  /** Separator placed between the inputs of a fan-in join. */
  joinSeparator?: string;
}

export interface RunOptions {
  trace?: ExecutionTrace;
  /** Record a `workflow_event` step for every executor completion. */
  streaming?: boolean;
}

/** Mutable state of a single run. Discarded once the run settles. */
class WorkflowRun {
  private readonly sinkOutputs: string[] = [];
  private readonly joins: Map<string, Map<number, string>> = new Map();
  private dispatched = 0;
  private events = 0;
  private aborted = false;

  constructor(
    private readonly graph: CompiledGraph,
    private readonly trace: ExecutionTrace,
    private readonly streaming: boolean,
    private readonly maxSteps: number,
    private readonly joinSeparator: string,
  ) {}

  async start(input: string): Promise<string> {
    try {
      await this.visit(this.graph.startExecutor, input);
    } catch (error) {
      this.abort();
      throw error;
    }

    for (const [nodeName, buffer] of this.joins) {
      logger.warn(
        `[WORKFLOW EXECUTE] Join '${nodeName}' never fired: ` +
          `${buffer.size}/${this.graph.joinEdges(nodeName).length} inputs arrived`
      );
    }
    return this.sinkOutputs.join(' ');
  }

  abort(): void {
    this.aborted = true;
  }

  private async visit(nodeName: string, message: string): Promise<void> {
    if (this.aborted) return;

    this.dispatched++;
    if (this.dispatched > this.maxSteps) {
      throw new WorkflowLimitError(
        `Workflow '${this.graph.name}' exceeded ${this.maxSteps} executor dispatches`
      );
    }

    const executor = this.graph.executor(nodeName);
    let output: string;
    try {
      output = await executor.invoke(message);
    } catch (error) {
      // stop launching new branches before the failure reaches the top
      this.abort();
      throw error;
    }

    // a sibling failed while this executor was in flight: its result is discarded
    if (this.aborted) return;

    if (this.streaming) {
      this.events++;
      this.trace.record({
        step: 'workflow_event',
        event_type: 'executor_completed',
        event_number: this.events,
        executor: nodeName,
        output_length: output.length,
      });
      logger.debug(`[WORKFLOW EVENT] executor_completed '${nodeName}' (event #${this.events})`);
    }

    const outgoing = this.graph.outgoing(nodeName);
    if (outgoing.length === 0) {
      this.sinkOutputs.push(output);
      return;
    }

    const routes = outgoing.filter(edge => this.isTaken(edge, output));
    if (routes.length === 0) {
      logger.info(`[WORKFLOW EXECUTE] No condition matched after '${nodeName}', branch ends`);
      return;
    }

    await Promise.all(routes.map(edge => this.deliver(edge, output)));
  }

  private isTaken(edge: CompiledEdge, output: string): boolean {
    if (edge.type !== 'conditional' || !edge.condition) {
      return true;
    }
    return evaluateCondition(edge.condition, output);
  }

  private async deliver(edge: CompiledEdge, message: string): Promise<void> {
    if (this.aborted) return;

    if (edge.type !== 'fan_in') {
      return this.visit(edge.to, message);
    }

    const joinEdges = this.graph.joinEdges(edge.to);
    if (joinEdges.length < 2) {
      return this.visit(edge.to, message);
    }

    let buffer = this.joins.get(edge.to);
    if (!buffer) {
      buffer = new Map();
      this.joins.set(edge.to, buffer);
    }
    if (buffer.has(edge.index)) {
      logger.warn(`[WORKFLOW EXECUTE] Join '${edge.to}' input from '${edge.from}' replaced before release`);
    }
    buffer.set(edge.index, message);

    if (buffer.size < joinEdges.length) {
      logger.debug(`[WORKFLOW EXECUTE] Join '${edge.to}' waiting: ${buffer.size}/${joinEdges.length} inputs`);
      return;
    }

    this.joins.delete(edge.to);
    const parts: string[] = [];
    for (const joinEdge of joinEdges) {
      parts.push(buffer.get(joinEdge.index) ?? '');
    }
    logger.debug(`[WORKFLOW EXECUTE] Join '${edge.to}' released with ${parts.length} inputs`);
    return this.visit(edge.to, parts.join(this.joinSeparator));
  }
}

/**
 * Walks a compiled graph from its start executor. Broadcast edges (`direct`,
 * `fan_out`) run their targets concurrently, `conditional` edges route on the
 * output, and a node with several `fan_in` edges waits for all of them. The
 * first agent failure fails the whole run.
 */
export class WorkflowEngine {
  private readonly maxSteps: number;
  private readonly joinSeparator: string;

  constructor(
    private readonly graph: CompiledGraph,
    options: WorkflowEngineOptions = {},
  ) {
    this.maxSteps = options.maxSteps ?? config.workflow.maxSteps;
    this.joinSeparator = options.joinSeparator ?? '\n\n';
  }

  async run(input: string, options: RunOptions = {}): Promise<WorkflowOutput> {
    const trace = options.trace || new ExecutionTrace();
    const streaming = options.streaming ?? false;
    const run = new WorkflowRun(this.graph, trace, streaming, this.maxSteps, this.joinSeparator);

    logger.info(
      `[WORKFLOW EXECUTE] Starting '${this.graph.name}' | ` +
        `Input length: ${input.length} chars | Streaming: ${streaming}`
    );
    trace.record({
      step: 'workflow_execution_started',
      workflow: this.graph.name,
      input_length: input.length,
      streaming,
    });

    try {
      const output = await run.start(input);
      trace.record({ step: 'workflow_execution_completed', status: 'success', output_length: output.length });
      logger.info(`[WORKFLOW SUCCESS] '${this.graph.name}' completed | Output: ${output.length} chars`);
      return { output, steps: trace.steps };
    } catch (error) {
      run.abort();
      const message = describeError(error);
      const failure: ExecutionStep = {
        step: 'workflow_execution_failed',
        error: message,
        error_type: errorTypeOf(error),
        error_kind: errorKindOf(error),
        ...(error instanceof AgentInvocationError ? { executor: error.agentName } : {}),
      };
      trace.record(failure);
      logger.error(`[WORKFLOW ERROR] '${this.graph.name}' failed: ${message}`);

      throw new WorkflowRunError(message, {
        kind: errorKindOf(error),
        steps: trace.steps,
        cause: error,
      });
    }
  }

  /**
   * Yields steps as they are recorded, in completion order across branches.
   * The generator's return value is the same aggregate `run` resolves to.
   */
  stream(input: string, trace: ExecutionTrace = new ExecutionTrace()): AsyncGenerator<ExecutionStep, WorkflowOutput, undefined> {
    return trace.follow(() => this.run(input, { trace, streaming: true }));
  }
}
