export class UnclassifiableRoleError extends Error {
  nodeId: string;
  tag: string;

  constructor(nodeId: string, tag: string, message?: string) {
    super(message ?? `Node "${nodeId}" declares unknown role tag "${tag}"; treated as a plain call.`);
    this.name = "UnclassifiableRoleError";
    this.nodeId = nodeId;
    this.tag = tag;
  }
}

export class UnknownSinkError extends Error {
  constructor(sinkId: string) {
    super(`Node "${sinkId}" is not a sink in this graph.`);
    this.name = "UnknownSinkError";
  }
}

export class ClassificationTimeoutError extends Error {
  timeoutMs: number;
  completedSinks: number;

  constructor(timeoutMs: number, completedSinks: number) {
    super(`Classification exceeded ${timeoutMs}ms after ${completedSinks} sink(s).`);
    this.name = "ClassificationTimeoutError";
    this.timeoutMs = timeoutMs;
    this.completedSinks = completedSinks;
  }
}
