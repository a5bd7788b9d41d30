import { logger } from '../utils/logger.js';

export type FunctionParameters = Record<string, unknown>;

/** A named function callable from a workflow. The current message arrives under `input`. */
export type NamedFunction = (parameters: FunctionParameters) => string | Promise<string>;

export class FunctionRegistry {
  private functions: Map<string, NamedFunction> = new Map();

  constructor(entries: Record<string, NamedFunction> = {}) {
    for (const [name, fn] of Object.entries(entries)) {
      this.register(name, fn);
    }
  }

  register(name: string, fn: NamedFunction): FunctionRegistry {
    if (this.functions.has(name)) {
      logger.warn(`Function '${name}' re-registered, replacing previous definition`);
    }
    this.functions.set(name, fn);
    return this;
  }

  get(name: string): NamedFunction | undefined {
    return this.functions.get(name);
  }

  has(name: string): boolean {
    return this.functions.has(name);
  }

  names(): string[] {
    return Array.from(this.functions.keys());
  }
}

export interface ToolDefinition {
  name: string;
  description?: string;
  [key: string]: unknown;
}

/** Capabilities an agent may be given, looked up by name from executor configs. */
export class ToolRegistry {
  private tools: Map<string, ToolDefinition> = new Map();

  constructor(tools: ToolDefinition[] = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: ToolDefinition): ToolRegistry {
    this.tools.set(tool.name, tool);
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** Without names every registered tool is returned; unknown names are dropped. */
  resolve(names?: readonly string[]): ToolDefinition[] {
    if (names === undefined) {
      return Array.from(this.tools.values());
    }

    const resolved: ToolDefinition[] = [];
    for (const name of names) {
      const tool = this.tools.get(name);
      if (tool) {
        resolved.push(tool);
      } else {
        logger.warn(`Tool '${name}' not found, skipping`);
      }
    }
    return resolved;
  }
}
