import { describe, expect, it } from 'vitest';
import {
  AgentInvocationError,
  FunctionInvocationError,
  ValidationError,
  WorkflowRunError,
  classifyFailure,
  isRateLimitError,
} from './errors.js';

function providerError(message: string, status?: number): Error {
  const error = new Error(message);
  if (status !== undefined) {
    Object.assign(error, { status });
  }
  return error;
}

describe('errors', () => {
  it('should describe agent and function failures', () => {
    const agentError = new AgentInvocationError('writer', new Error('boom'));
    expect(agentError.message).toBe("Agent 'writer' failed: boom");
    expect(agentError.agentName).toBe('writer');
    expect(agentError.kind).toBe('agent_invocation');
    expect(agentError.cause).toBeInstanceOf(Error);

    const functionError = new FunctionInvocationError('execute_command', 'exit 1');
    expect(functionError.message).toBe("Error executing function 'execute_command': exit 1");
  });

  it('should recognise rate-limit rejections', () => {
    expect(isRateLimitError(providerError('quota', 429))).toBe(true);
    expect(isRateLimitError(providerError('Too Many Requests'))).toBe(true);
    expect(isRateLimitError(Object.assign(new Error('slow down'), { name: 'RateLimitError' }))).toBe(true);
    expect(isRateLimitError(providerError('internal error', 500))).toBe(false);
  });

  it('should follow the cause chain', () => {
    const agentError = new AgentInvocationError('writer', providerError('quota', 429));
    const runError = new WorkflowRunError(agentError.message, { kind: 'agent_invocation', steps: [], cause: agentError });

    expect(isRateLimitError(runError)).toBe(true);
    expect(classifyFailure(runError)).toBe('rate_limited');
  });

  it('should only inspect provider causes, not workflow error messages', () => {
    expect(isRateLimitError(new AgentInvocationError('RateLimitAuditor', new Error('connection reset')))).toBe(false);
    expect(isRateLimitError(new ValidationError("Start executor 'rate limit' not found"))).toBe(false);
    expect(isRateLimitError(new AgentInvocationError('RateLimitAuditor', providerError('Too Many Requests')))).toBe(true);
  });

  it('should classify failures for a boundary layer', () => {
    expect(classifyFailure(new ValidationError('bad'))).toBe('validation');
    expect(classifyFailure(new AgentInvocationError('writer', new Error('upstream down')))).toBe('service_unavailable');
    expect(
      classifyFailure(
        new WorkflowRunError('x', {
          kind: 'agent_invocation',
          steps: [],
          cause: new AgentInvocationError('writer', new Error('upstream down')),
        })
      )
    ).toBe('service_unavailable');
    expect(classifyFailure(new TypeError('oops'))).toBe('internal');
  });
});
