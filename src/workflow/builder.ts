import { config } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import type { AgentInvoker } from './agent.js';
import { ValidationError } from './errors.js';
import { CompiledGraph, type CompiledEdge } from './graph.js';
import { AgentExecutor, FunctionExecutor, type Executor } from './node.js';
import type { RateLimiter } from './rate-limiter.js';
import { FunctionRegistry, ToolRegistry } from './registry.js';
import { isAgentExecutorConfig, isFunctionExecutorConfig } from './schema.js';
import { ExecutionTrace } from './trace.js';
import type {
  AgentExecutorConfig,
  ExecutorConfigEntry,
  FunctionExecutorConfig,
  WorkflowDefinition,
} from './types.js';

export interface WorkflowGraphBuilderOptions {
  invoker: AgentInvoker;
  rateLimiter: RateLimiter;
  functions?: FunctionRegistry;
  tools?: ToolRegistry;
  defaultInstructions?: string;
  /** Turn a detected cycle into a ValidationError instead of a warning. */
  rejectCycles?: boolean;
}

/**
 * Compiles a workflow definition into a graph of executors and typed edges.
 * Edges and executors that cannot be resolved are dropped with a log line;
 * only a missing executor list or start executor stops the build.
 */
export class WorkflowGraphBuilder {
  private invoker: AgentInvoker;
  private rateLimiter: RateLimiter;
  private functions: FunctionRegistry;
  private tools: ToolRegistry;
  private defaultInstructions: string;
  private rejectCycles: boolean;

  constructor(options: WorkflowGraphBuilderOptions) {
    this.invoker = options.invoker;
    this.rateLimiter = options.rateLimiter;
    this.functions = options.functions || new FunctionRegistry();
    this.tools = options.tools || new ToolRegistry();
    this.defaultInstructions = options.defaultInstructions || config.workflow.defaultInstructions;
    this.rejectCycles = options.rejectCycles ?? config.workflow.rejectCycles;
  }

  build(definition: WorkflowDefinition, trace: ExecutionTrace = new ExecutionTrace()): CompiledGraph {
    this.validate(definition);

    const executors = new Map<string, Executor>();
    for (const executorConfig of definition.executors) {
      logger.info(`[EXECUTOR CREATE] '${executorConfig.name}' (type: ${executorConfig.type})`);
      const executor = this.createExecutor(executorConfig);
      if (!executor) continue;

      executors.set(executorConfig.name, executor);
      trace.record({ step: 'executor_created', executor: executor.name, type: executor.kind });
    }

    if (!executors.has(definition.start_executor)) {
      const message = `Start executor '${definition.start_executor}' could not be created`;
      logger.error(`[WORKFLOW ERROR] ${message}`);
      throw new ValidationError(message);
    }
    logger.info(`[WORKFLOW BUILD] Start executor: ${definition.start_executor}`);

    const edges: CompiledEdge[] = [];
    for (const edgeConfig of definition.edges) {
      if (!executors.has(edgeConfig.from_executor)) {
        logger.warn(`[WORKFLOW BUILD] Edge from '${edgeConfig.from_executor}' skipped - executor not found`);
        continue;
      }
      if (!executors.has(edgeConfig.to_executor)) {
        logger.warn(`[WORKFLOW BUILD] Edge to '${edgeConfig.to_executor}' skipped - executor not found`);
        continue;
      }
      if (edgeConfig.edge_type === 'conditional' && !edgeConfig.condition) {
        logger.warn(
          `[WORKFLOW BUILD] Conditional edge ${edgeConfig.from_executor} → ${edgeConfig.to_executor} ` +
            'has no condition, it will always be taken'
        );
      }

      const edge: CompiledEdge = {
        index: edges.length,
        from: edgeConfig.from_executor,
        to: edgeConfig.to_executor,
        type: edgeConfig.edge_type,
      };
      if (edgeConfig.edge_type === 'conditional' && edgeConfig.condition) {
        edge.condition = edgeConfig.condition;
      }
      edges.push(edge);

      logger.debug(`[WORKFLOW BUILD] Edge: ${edge.from} → ${edge.to} (${edge.type})`);
      trace.record({ step: 'edge_added', from: edge.from, to: edge.to, type: edge.type });
    }
    logger.info(`[WORKFLOW BUILD] Added ${edges.length} edges`);

    const graph = new CompiledGraph(definition.name, definition.start_executor, executors, edges);

    const cycle = graph.findCycle();
    if (cycle) {
      const message = `Cycle detected in workflow '${definition.name}': ${cycle.join(' → ')}`;
      if (this.rejectCycles) {
        logger.error(`[WORKFLOW ERROR] ${message}`);
        throw new ValidationError(message);
      }
      logger.warn(`[WORKFLOW BUILD] ${message}`);
    }

    trace.record({ step: 'workflow_built', status: 'success', executors: executors.size, edges: edges.length });
    logger.info('[WORKFLOW BUILD] Workflow built successfully');
    return graph;
  }

  private validate(definition: WorkflowDefinition): void {
    if (definition.executors.length === 0) {
      logger.error('[WORKFLOW ERROR] Workflow has no executors');
      throw new ValidationError('Workflow must have at least one executor');
    }

    const seen = new Set<string>();
    const duplicates = new Set<string>();
    for (const executorConfig of definition.executors) {
      if (seen.has(executorConfig.name)) duplicates.add(executorConfig.name);
      seen.add(executorConfig.name);
    }
    if (duplicates.size > 0) {
      const names = Array.from(duplicates).map(name => `'${name}'`).join(', ');
      throw new ValidationError(`Duplicate executor names: ${names}`);
    }

    if (!seen.has(definition.start_executor)) {
      const message = `Start executor '${definition.start_executor}' not found`;
      logger.error(`[WORKFLOW ERROR] ${message}`);
      throw new ValidationError(message);
    }
  }

  private createExecutor(executorConfig: ExecutorConfigEntry): Executor | null {
    if (isAgentExecutorConfig(executorConfig)) {
      return this.createAgentExecutor(executorConfig);
    }
    if (isFunctionExecutorConfig(executorConfig)) {
      return this.createFunctionExecutor(executorConfig);
    }
    logger.error(`[EXECUTOR ERROR] Unknown executor type: ${executorConfig.type}`, {
      executor: executorConfig.name,
    });
    return null;
  }

  private createAgentExecutor(executorConfig: AgentExecutorConfig): AgentExecutor {
    const agentName = executorConfig.agent_name || executorConfig.name;
    return new AgentExecutor({
      name: executorConfig.name,
      agentName,
      agentId: executorConfig.agent_id || agentName,
      instructions: executorConfig.instructions || this.defaultInstructions,
      tools: this.tools.resolve(executorConfig.tools),
      invoker: this.invoker,
      rateLimiter: this.rateLimiter,
    });
  }

  private createFunctionExecutor(executorConfig: FunctionExecutorConfig): FunctionExecutor {
    if (!this.functions.has(executorConfig.function_name)) {
      logger.warn(
        `[EXECUTOR CREATE] Function '${executorConfig.function_name}' is not registered; ` +
          `'${executorConfig.name}' will report an error when invoked`
      );
    }
    return new FunctionExecutor({
      name: executorConfig.name,
      functionName: executorConfig.function_name,
      parameters: executorConfig.parameters,
      registry: this.functions,
    });
  }
}
