export class StructuralGraphError extends Error {
  nodeId?: string;
  edge?: { from: string; to: string };

  constructor(message: string, context: { nodeId?: string; edge?: { from: string; to: string } } = {}) {
    super(message);
    this.name = "StructuralGraphError";
    this.nodeId = context.nodeId;
    this.edge = context.edge;
  }
}

export class DuplicateNodeError extends StructuralGraphError {
  constructor(nodeId: string) {
    super(`Duplicate node id "${nodeId}".`, { nodeId });
    this.name = "DuplicateNodeError";
  }
}

export class DanglingEdgeError extends StructuralGraphError {
  constructor(from: string, to: string, missing: string) {
    super(`Edge ${from} -> ${to} references unknown node "${missing}".`, {
      nodeId: missing,
      edge: { from, to }
    });
    this.name = "DanglingEdgeError";
  }
}

export class UnknownNodeError extends StructuralGraphError {
  constructor(nodeId: string) {
    super(`Unknown node id "${nodeId}".`, { nodeId });
    this.name = "UnknownNodeError";
  }
}

export class InvalidEntryPointError extends StructuralGraphError {
  constructor(nodeId: string, kind: string) {
    super(`Node "${nodeId}" is a ${kind}, only EntryPoint nodes can be registered.`, { nodeId });
    this.name = "InvalidEntryPointError";
  }
}

export class OrphanedSinkError extends StructuralGraphError {
  constructor(nodeId: string) {
    super(`Sink "${nodeId}" has no incoming edge and is unreachable from any node.`, { nodeId });
    this.name = "OrphanedSinkError";
  }
}

export class GraphInputError extends Error {
  field?: string;

  constructor(message: string, field?: string) {
    super(field ? `Invalid graph input at ${field}: ${message}` : `Invalid graph input: ${message}`);
    this.name = "GraphInputError";
    this.field = field;
  }
}

export function isMalformedGraphError(err: unknown): err is StructuralGraphError | GraphInputError {
  return err instanceof StructuralGraphError || err instanceof GraphInputError;
}
