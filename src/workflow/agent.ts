import type { ToolDefinition } from './registry.js';

export interface AgentSpec {
  name: string;
  id: string;
  instructions: string;
  tools: ToolDefinition[];
}

export type AgentRunResult = string | { text?: string | null } | null | undefined;

export interface AgentHandle {
  run(message: string): Promise<AgentRunResult>;
}

/**
 * The conversational-agent capability the engine consumes. Implementations
 * wrap a concrete LLM client; retries, authentication and timeouts are theirs.
 */
export interface AgentInvoker {
  createAgent(spec: AgentSpec): AgentHandle | Promise<AgentHandle>;
}

export function responseText(result: AgentRunResult): string | undefined {
  if (typeof result === 'string') return result;
  if (result && typeof result.text === 'string') return result.text;
  return undefined;
}
