import type { AgentExecutorConfig, EdgeCondition, EdgeConfig, ExecutorConfig, WorkflowDefinition } from './types.js';

export interface ConditionalRoute {
  executor: ExecutorConfig;
  when: EdgeCondition;
}

export function agentStep(name: string, instructions?: string, tools?: string[]): AgentExecutorConfig {
  return {
    type: 'agent',
    name,
    ...(instructions !== undefined ? { instructions } : {}),
    ...(tools !== undefined ? { tools } : {}),
  };
}

/** Each step feeds the next over a `direct` edge. */
export function sequentialWorkflow(name: string, steps: ExecutorConfig[], description?: string): WorkflowDefinition {
  if (steps.length === 0) {
    throw new Error('A sequential workflow needs at least one step');
  }

  const edges: EdgeConfig[] = [];
  for (let i = 1; i < steps.length; i++) {
    edges.push({ from_executor: steps[i - 1].name, to_executor: steps[i].name, edge_type: 'direct' });
  }

  return {
    name,
    description,
    executors: steps,
    edges,
    start_executor: steps[0].name,
    workflow_type: 'sequential',
  };
}

/** `source` broadcasts to every branch; `aggregator`, when given, joins them back together. */
export function fanOutWorkflow(
  name: string,
  source: ExecutorConfig,
  branches: ExecutorConfig[],
  aggregator?: ExecutorConfig,
  description?: string,
): WorkflowDefinition {
  const edges: EdgeConfig[] = branches.map(branch => ({
    from_executor: source.name,
    to_executor: branch.name,
    edge_type: 'fan_out',
  }));
  if (aggregator) {
    for (const branch of branches) {
      edges.push({ from_executor: branch.name, to_executor: aggregator.name, edge_type: 'fan_in' });
    }
  }

  return {
    name,
    description,
    executors: aggregator ? [source, ...branches, aggregator] : [source, ...branches],
    edges,
    start_executor: source.name,
    workflow_type: 'parallel',
  };
}

/** `router` output is matched against each route's condition; every matching route runs. */
export function conditionalWorkflow(
  name: string,
  router: ExecutorConfig,
  routes: ConditionalRoute[],
  description?: string,
): WorkflowDefinition {
  return {
    name,
    description,
    executors: [router, ...routes.map(route => route.executor)],
    edges: routes.map(route => ({
      from_executor: router.name,
      to_executor: route.executor.name,
      edge_type: 'conditional',
      condition: route.when,
    })),
    start_executor: router.name,
    workflow_type: 'conditional',
  };
}
