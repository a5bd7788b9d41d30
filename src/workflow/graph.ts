import type { Executor } from './node.js';
import type { EdgeCondition, EdgeType } from './types.js';

export interface CompiledEdge {
  /** Position among the edges that survived the build, in declaration order. */
  index: number;
  from: string;
  to: string;
  type: EdgeType;
  condition?: EdgeCondition;
}

export interface GraphDescription {
  name: string;
  startExecutor: string;
  nodes: Array<{ name: string; kind: Executor['kind'] }>;
  edges: Array<{ from: string; to: string; type: EdgeType; condition?: EdgeCondition }>;
}

/** Read-only once built. Owns the executors; engines borrow it for a run. */
export class CompiledGraph {
  readonly name: string;
  readonly startExecutor: string;
  private readonly nodes: ReadonlyMap<string, Executor>;
  private readonly edgeList: readonly CompiledEdge[];
  private readonly outgoingEdges: Map<string, CompiledEdge[]> = new Map();
  private readonly incomingEdges: Map<string, CompiledEdge[]> = new Map();

  constructor(name: string, startExecutor: string, nodes: ReadonlyMap<string, Executor>, edges: readonly CompiledEdge[]) {
    this.name = name;
    this.startExecutor = startExecutor;
    this.nodes = nodes;
    this.edgeList = edges;

    for (const nodeName of nodes.keys()) {
      this.outgoingEdges.set(nodeName, []);
      this.incomingEdges.set(nodeName, []);
    }
    for (const edge of edges) {
      this.outgoingEdges.get(edge.from)?.push(edge);
      this.incomingEdges.get(edge.to)?.push(edge);
    }
  }

  get executors(): ReadonlyMap<string, Executor> {
    return this.nodes;
  }

  get edges(): readonly CompiledEdge[] {
    return this.edgeList;
  }

  get edgeCount(): number {
    return this.edgeList.length;
  }

  has(name: string): boolean {
    return this.nodes.has(name);
  }

  executor(name: string): Executor {
    const executor = this.nodes.get(name);
    if (!executor) {
      throw new Error(`Executor '${name}' is not part of workflow '${this.name}'`);
    }
    return executor;
  }

  outgoing(name: string): readonly CompiledEdge[] {
    return this.outgoingEdges.get(name) || [];
  }

  incoming(name: string): readonly CompiledEdge[] {
    return this.incomingEdges.get(name) || [];
  }

  /** Incoming `fan_in` edges, in declaration order. */
  joinEdges(name: string): readonly CompiledEdge[] {
    return this.incoming(name).filter(edge => edge.type === 'fan_in');
  }

  sinks(): string[] {
    return Array.from(this.nodes.keys()).filter(name => this.outgoing(name).length === 0);
  }

  /** Returns the node names of the first cycle found, first node repeated at the end, or null. */
  findCycle(): string[] | null {
    const visited = new Set<string>();
    const path: string[] = [];
    const onPath = new Set<string>();

    const visit = (nodeName: string): string[] | null => {
      if (onPath.has(nodeName)) {
        return [...path.slice(path.indexOf(nodeName)), nodeName];
      }
      if (visited.has(nodeName)) return null;

      onPath.add(nodeName);
      path.push(nodeName);
      for (const edge of this.outgoing(nodeName)) {
        const cycle = visit(edge.to);
        if (cycle) return cycle;
      }
      path.pop();
      onPath.delete(nodeName);
      visited.add(nodeName);
      return null;
    };

    for (const nodeName of this.nodes.keys()) {
      const cycle = visit(nodeName);
      if (cycle) return cycle;
    }
    return null;
  }

  describe(): GraphDescription {
    return {
      name: this.name,
      startExecutor: this.startExecutor,
      nodes: Array.from(this.nodes.values()).map(executor => ({ name: executor.name, kind: executor.kind })),
      edges: this.edgeList.map(edge => ({
        from: edge.from,
        to: edge.to,
        type: edge.type,
        ...(edge.condition ? { condition: edge.condition } : {}),
      })),
    };
  }
}
