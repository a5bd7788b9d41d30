import { z } from 'zod';
import { ValidationError } from './errors.js';

export const CONDITION_OPERATORS = [
  'equals',
  'contains',
  'starts_with',
  'ends_with',
  'greater_than',
  'less_than',
] as const;

export const EDGE_TYPES = ['direct', 'conditional', 'fan_out', 'fan_in'] as const;

export const WORKFLOW_TYPES = ['sequential', 'parallel', 'conditional', 'dynamic'] as const;

// Operators stay open-ended here: an unknown operator is a routing miss, not a parse failure.
export const EdgeConditionSchema = z.object({
  field: z.string().min(1),
  operator: z.string().min(1),
  value: z.unknown(),
});

export const EdgeConfigSchema = z.object({
  from_executor: z.string().min(1),
  to_executor: z.string().min(1),
  edge_type: z.enum(EDGE_TYPES).default('direct'),
  condition: EdgeConditionSchema.optional(),
});

export const AgentExecutorConfigSchema = z.object({
  type: z.literal('agent'),
  name: z.string().min(1),
  agent_name: z.string().min(1).optional(),
  agent_id: z.string().min(1).optional(),
  instructions: z.string().optional(),
  tools: z.array(z.string()).optional(),
});

export const FunctionExecutorConfigSchema = z.object({
  type: z.literal('function'),
  name: z.string().min(1),
  function_name: z.string().min(1),
  parameters: z.record(z.string(), z.unknown()).optional(),
});

export type AgentExecutorConfig = z.infer<typeof AgentExecutorConfigSchema>;
export type FunctionExecutorConfig = z.infer<typeof FunctionExecutorConfigSchema>;

/** An executor entry whose `type` this engine does not know. The builder skips it. */
export interface UnsupportedExecutorConfig {
  type: string;
  name: string;
  [key: string]: unknown;
}

export type ExecutorConfig = AgentExecutorConfig | FunctionExecutorConfig;
export type ExecutorConfigEntry = ExecutorConfig | UnsupportedExecutorConfig;

function parseVariant<T extends z.ZodTypeAny>(schema: T, value: unknown, ctx: z.RefinementCtx): z.output<T> {
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return parsed.data;
  }
  for (const issue of parsed.error.issues) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue.message, path: issue.path });
  }
  return z.NEVER;
}

export const ExecutorConfigSchema = z
  .object({
    type: z.string().optional(),
    name: z.string().min(1),
  })
  .passthrough()
  .transform((raw, ctx): ExecutorConfigEntry => {
    const type = raw.type ?? ('function_name' in raw ? 'function' : 'agent');
    if (type === 'agent') {
      return parseVariant(AgentExecutorConfigSchema, { ...raw, type }, ctx);
    }
    if (type === 'function') {
      return parseVariant(FunctionExecutorConfigSchema, { ...raw, type }, ctx);
    }
    return { ...raw, type };
  });

export const WorkflowDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  executors: z.array(ExecutorConfigSchema).min(1, 'Workflow must have at least one executor'),
  edges: z.array(EdgeConfigSchema).default([]),
  start_executor: z.string().min(1, 'Workflow must specify a start executor'),
  workflow_type: z.enum(WORKFLOW_TYPES).default('sequential'),
});

export type EdgeCondition = z.infer<typeof EdgeConditionSchema>;
export type EdgeConfig = z.infer<typeof EdgeConfigSchema>;
export type EdgeType = (typeof EDGE_TYPES)[number];
export type ConditionOperator = (typeof CONDITION_OPERATORS)[number];
export type WorkflowType = (typeof WORKFLOW_TYPES)[number];
export type WorkflowDefinition = z.output<typeof WorkflowDefinitionSchema>;
/** What callers may hand in: defaults (`edge_type`, `workflow_type`, executor `type`) can be omitted. */
export type WorkflowDefinitionInput = z.input<typeof WorkflowDefinitionSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function parseWorkflowDefinition(input: unknown): WorkflowDefinition {
  const parsed = WorkflowDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ValidationError(`Invalid workflow definition: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

export function isAgentExecutorConfig(config: ExecutorConfigEntry): config is AgentExecutorConfig {
  return config.type === 'agent';
}

export function isFunctionExecutorConfig(config: ExecutorConfigEntry): config is FunctionExecutorConfig {
  return config.type === 'function';
}

/** Parses a definition arriving as JSON text. Malformed JSON is a validation failure too. */
export function parseWorkflowJson(text: string): WorkflowDefinition {
  let input: unknown;
  try {
    input = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Invalid workflow definition: malformed JSON (${reason})`);
  }
  return parseWorkflowDefinition(input);
}
