import type { ExecutionStep } from './types.js';

export type WorkflowErrorKind =
  | 'validation'
  | 'agent_invocation'
  | 'function_invocation'
  | 'limit_exceeded'
  | 'internal';

export type FailureClass = 'validation' | 'rate_limited' | 'service_unavailable' | 'internal';

export class WorkflowError extends Error {
  readonly kind: WorkflowErrorKind;

  constructor(message: string, kind: WorkflowErrorKind, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WorkflowError';
    this.kind = kind;
  }
}

export class ValidationError extends WorkflowError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [message]) {
    super(message, 'validation');
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class AgentInvocationError extends WorkflowError {
  readonly agentName: string;

  constructor(agentName: string, cause: unknown) {
    super(`Agent '${agentName}' failed: ${describeError(cause)}`, 'agent_invocation', { cause });
    this.name = 'AgentInvocationError';
    this.agentName = agentName;
  }
}

export class FunctionInvocationError extends WorkflowError {
  readonly functionName: string;

  constructor(functionName: string, cause: unknown) {
    super(`Error executing function '${functionName}': ${describeError(cause)}`, 'function_invocation', { cause });
    this.name = 'FunctionInvocationError';
    this.functionName = functionName;
  }
}

export class WorkflowLimitError extends WorkflowError {
  constructor(message: string) {
    super(message, 'limit_exceeded');
    this.name = 'WorkflowLimitError';
  }
}

export interface WorkflowRunErrorDetails {
  kind: WorkflowErrorKind;
  steps: readonly ExecutionStep[];
  traceId?: string;
  cause?: unknown;
}

/** Raised for any failed run; carries the trace recorded up to and including the failure. */
export class WorkflowRunError extends WorkflowError {
  readonly steps: readonly ExecutionStep[];
  readonly traceId: string | undefined;

  constructor(message: string, details: WorkflowRunErrorDetails) {
    super(message, details.kind, { cause: details.cause });
    this.name = 'WorkflowRunError';
    this.steps = details.steps;
    this.traceId = details.traceId;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function errorKindOf(error: unknown): WorkflowErrorKind {
  return error instanceof WorkflowError ? error.kind : 'internal';
}

export function errorTypeOf(error: unknown): string {
  return error instanceof Error ? error.name : typeof error;
}

function* causeChain(error: unknown): Generator<unknown> {
  const seen = new Set<unknown>();
  let current: unknown = error;
  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    yield current;
    current = current instanceof Error ? current.cause : undefined;
  }
}

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  for (const key of ['status', 'statusCode']) {
    const value: unknown = Reflect.get(error, key);
    if (typeof value === 'number') return value;
  }
  return undefined;
}

const RATE_LIMIT_PATTERN = /\b429\b|too many requests|rate ?limit/i;

/**
 * True when the provider rejected a call for rate-limiting reasons, anywhere along the cause chain.
 * The engine's own errors are skipped: their messages carry user-chosen executor names.
 */
export function isRateLimitError(error: unknown): boolean {
  for (const link of causeChain(error)) {
    if (link instanceof WorkflowError) continue;
    if (statusOf(link) === 429) return true;
    if (link instanceof Error) {
      if (link.name === 'RateLimitError') return true;
      if (RATE_LIMIT_PATTERN.test(link.message)) return true;
    } else if (typeof link === 'string' && RATE_LIMIT_PATTERN.test(link)) {
      return true;
    }
  }
  return false;
}

export function classifyFailure(error: unknown): FailureClass {
  if (errorKindOf(error) === 'validation') return 'validation';
  if (isRateLimitError(error)) return 'rate_limited';
  for (const link of causeChain(error)) {
    if (link instanceof WorkflowError && link.kind === 'agent_invocation') return 'service_unavailable';
  }
  return 'internal';
}
