export { WorkflowService } from './workflow/service.js';
export type { DefinitionSource, WorkflowServiceOptions, ExecuteOptions } from './workflow/service.js';
export { WorkflowGraphBuilder } from './workflow/builder.js';
export type { WorkflowGraphBuilderOptions } from './workflow/builder.js';
export { WorkflowEngine } from './workflow/engine.js';
export type { WorkflowEngineOptions, RunOptions } from './workflow/engine.js';
export { CompiledGraph } from './workflow/graph.js';
export type { CompiledEdge, GraphDescription } from './workflow/graph.js';
export { AgentExecutor, FunctionExecutor, WorkflowExecutor } from './workflow/node.js';
export type { Executor, AgentExecutorOptions, FunctionExecutorOptions } from './workflow/node.js';
export type { AgentHandle, AgentInvoker, AgentRunResult, AgentSpec } from './workflow/agent.js';
export { FunctionRegistry, ToolRegistry } from './workflow/registry.js';
export type { FunctionParameters, NamedFunction, ToolDefinition } from './workflow/registry.js';
export { RateLimiter, getSharedRateLimiter } from './workflow/rate-limiter.js';
export type { RateLimiterOptions, RateLimiterStats } from './workflow/rate-limiter.js';
export { evaluateCondition, lookupField } from './workflow/condition.js';
export { ExecutionTrace } from './workflow/trace.js';
export type { StepListener } from './workflow/trace.js';
export {
  AgentInvocationError,
  FunctionInvocationError,
  ValidationError,
  WorkflowError,
  WorkflowLimitError,
  WorkflowRunError,
  classifyFailure,
  isRateLimitError,
} from './workflow/errors.js';
export type { FailureClass, WorkflowErrorKind } from './workflow/errors.js';
export {
  CONDITION_OPERATORS,
  EDGE_TYPES,
  WORKFLOW_TYPES,
  WorkflowDefinitionSchema,
  parseWorkflowDefinition,
  parseWorkflowJson,
} from './workflow/schema.js';
export { agentStep, conditionalWorkflow, fanOutWorkflow, sequentialWorkflow } from './workflow/templates.js';
export type { ConditionalRoute } from './workflow/templates.js';
export type * from './workflow/types.js';
export { logger, createLogger, setLogLevel } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
export { config } from './utils/config.js';
