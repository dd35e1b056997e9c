import {
  BranchCondition,
  NodeKind,
  type GraphEdge,
  type GraphNode,
  type NodeMetadata,
  type RoleTag
} from "../types/domain/graph.js";
import {
  DanglingEdgeError,
  DuplicateNodeError,
  InvalidEntryPointError,
  UnknownNodeError
} from "../errors/graph.errors.js";

export type NodeInput = {
  id: string;
  kind: NodeKind;
  roleTags?: RoleTag[];
  metadata?: NodeMetadata;
  label?: string;
};

function freezeTag(tag: RoleTag): RoleTag {
  if (typeof tag === "string") return tag;
  return Object.freeze({
    role: tag.role,
    ...(tag.strength !== undefined ? { strength: tag.strength } : {}),
    ...(tag.protects !== undefined ? { protects: [...tag.protects] } : {})
  });
}

/**
 * Read-only call graph. Nodes and edges keep declaration order, which is what the
 * path enumerator walks, so two runs over the same input yield the same paths.
 */
export class CallGraph {
  readonly nodes: readonly GraphNode[];
  readonly edges: readonly GraphEdge[];
  private readonly byId: ReadonlyMap<string, GraphNode>;
  private readonly outgoingById: ReadonlyMap<string, readonly GraphEdge[]>;
  private readonly incomingById: ReadonlyMap<string, readonly GraphEdge[]>;
  private readonly registered: ReadonlySet<string>;

  constructor(params: { nodes: GraphNode[]; edges: GraphEdge[]; registered: Iterable<string> }) {
    this.nodes = Object.freeze([...params.nodes]);
    this.edges = Object.freeze([...params.edges]);
    this.registered = new Set(params.registered);

    const byId = new Map<string, GraphNode>();
    const outgoing = new Map<string, GraphEdge[]>();
    const incoming = new Map<string, GraphEdge[]>();
    for (const node of this.nodes) {
      byId.set(node.id, node);
      outgoing.set(node.id, []);
      incoming.set(node.id, []);
    }
    for (const edge of this.edges) {
      outgoing.get(edge.from)?.push(edge);
      incoming.get(edge.to)?.push(edge);
    }
    this.byId = byId;
    this.outgoingById = outgoing;
    this.incomingById = incoming;
  }

  getNode(id: string): GraphNode | undefined {
    return this.byId.get(id);
  }

  requireNode(id: string): GraphNode {
    const node = this.byId.get(id);
    if (!node) throw new UnknownNodeError(id);
    return node;
  }

  outgoing(id: string): readonly GraphEdge[] {
    return this.outgoingById.get(id) ?? [];
  }

  incoming(id: string): readonly GraphEdge[] {
    return this.incomingById.get(id) ?? [];
  }

  entryPoints(): GraphNode[] {
    return this.nodes.filter((node) => node.kind === NodeKind.EntryPoint);
  }

  sinks(): GraphNode[] {
    return this.nodes.filter((node) => node.kind === NodeKind.Sink);
  }

  isRegistered(id: string): boolean {
    return this.registered.has(id);
  }

  registeredEntryPoints(): string[] {
    return this.entryPoints()
      .filter((node) => this.registered.has(node.id))
      .map((node) => node.id);
  }

  /** Sinks with no incoming edge from another node. A self-loop alone does not count. */
  orphanedSinks(): string[] {
    return this.sinks()
      .filter((sink) => !this.incoming(sink.id).some((edge) => edge.from !== sink.id))
      .map((sink) => sink.id);
  }

  /** Every node with a path to `id` over any edge, `id` included. */
  nodesReaching(id: string): Set<string> {
    const reached = new Set<string>();
    if (!this.byId.has(id)) return reached;
    reached.add(id);
    const queue = [id];
    for (let i = 0; i < queue.length; i += 1) {
      for (const edge of this.incoming(queue[i])) {
        if (reached.has(edge.from)) continue;
        reached.add(edge.from);
        queue.push(edge.from);
      }
    }
    return reached;
  }
}

export class CallGraphBuilder {
  private readonly nodes = new Map<string, GraphNode>();
  private readonly edges: GraphEdge[] = [];
  private readonly registered = new Set<string>();

  addNode(input: NodeInput): this {
    if (this.nodes.has(input.id)) {
      throw new DuplicateNodeError(input.id);
    }
    const node: GraphNode = Object.freeze({
      id: input.id,
      kind: input.kind,
      roleTags: Object.freeze((input.roleTags ?? []).map(freezeTag)),
      metadata: Object.freeze({ ...(input.metadata ?? {}) }),
      ...(input.label !== undefined ? { label: input.label } : {})
    });
    this.nodes.set(node.id, node);
    return this;
  }

  addEdge(from: string, to: string, condition: BranchCondition = BranchCondition.Always): this {
    if (!this.nodes.has(from)) throw new DanglingEdgeError(from, to, from);
    if (!this.nodes.has(to)) throw new DanglingEdgeError(from, to, to);
    this.edges.push(Object.freeze({ from, to, condition }));
    return this;
  }

  markEntryRegistered(id: string): this {
    const node = this.nodes.get(id);
    if (!node) throw new UnknownNodeError(id);
    if (node.kind !== NodeKind.EntryPoint) {
      throw new InvalidEntryPointError(id, node.kind);
    }
    this.registered.add(id);
    return this;
  }

  build(): CallGraph {
    return new CallGraph({
      nodes: Array.from(this.nodes.values()),
      edges: this.edges,
      registered: this.registered
    });
  }
}

export function createGraphBuilder(): CallGraphBuilder {
  return new CallGraphBuilder();
}
