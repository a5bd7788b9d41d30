import type { EdgeType } from './schema.js';
import type { WorkflowErrorKind } from './errors.js';

export type {
  AgentExecutorConfig,
  ConditionOperator,
  EdgeCondition,
  EdgeConfig,
  EdgeType,
  ExecutorConfig,
  ExecutorConfigEntry,
  FunctionExecutorConfig,
  UnsupportedExecutorConfig,
  WorkflowDefinition,
  WorkflowDefinitionInput,
  WorkflowType,
} from './schema.js';

export type ExecutorKind = 'agent' | 'function';

export type StepKind =
  | 'executor_created'
  | 'edge_added'
  | 'workflow_built'
  | 'workflow_execution_started'
  | 'workflow_event'
  | 'workflow_execution_completed'
  | 'workflow_execution_failed';

export type ExecutionStep =
  | { step: 'executor_created'; executor: string; type: ExecutorKind }
  | { step: 'edge_added'; from: string; to: string; type: EdgeType }
  | { step: 'workflow_built'; status: 'success'; executors: number; edges: number }
  | { step: 'workflow_execution_started'; workflow: string; input_length: number; streaming: boolean }
  | {
      step: 'workflow_event';
      event_type: 'executor_completed';
      event_number: number;
      executor: string;
      output_length: number;
    }
  | { step: 'workflow_execution_completed'; status: 'success'; output_length: number }
  | {
      step: 'workflow_execution_failed';
      error: string;
      error_type: string;
      error_kind: WorkflowErrorKind;
      executor?: string;
    };

export type StepOf<K extends StepKind> = Extract<ExecutionStep, { step: K }>;

export interface WorkflowOutput {
  output: string;
  steps: readonly ExecutionStep[];
}

export interface WorkflowRunResult extends WorkflowOutput {
  traceId: string;
  workflowId: string;
}
