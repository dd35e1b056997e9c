export const NodeKind = {
  EntryPoint: "EntryPoint",
  Call: "Call",
  Branch: "Branch",
  Sink: "Sink"
} as const;

export type NodeKind = (typeof NodeKind)[keyof typeof NodeKind];

export const BranchCondition = {
  Always: "Always",
  Never: "Never",
  Runtime: "Runtime"
} as const;

export type BranchCondition = (typeof BranchCondition)[keyof typeof BranchCondition];

export type SinkType = "SQL" | "Template" | "Command" | "Other";

export type ValidatorStrength = "Strict" | "Weak" | "None";

/**
 * Role tag as declared by the front end that produced the graph. Strings use the
 * `role[:strength]` shorthand ("validator:strict"), objects spell the fields out.
 */
export type RoleTagObject = {
  role: string;
  strength?: string;
  protects?: string[];
};

export type RoleTag = string | RoleTagObject;

export type NodeMetadata = {
  sinkType?: SinkType;
  strength?: ValidatorStrength;
  protects?: string[];
  [key: string]: unknown;
};

export type GraphNode = {
  readonly id: string;
  readonly kind: NodeKind;
  readonly roleTags: readonly RoleTag[];
  readonly metadata: Readonly<NodeMetadata>;
  readonly label?: string;
};

export type GraphEdge = {
  readonly from: string;
  readonly to: string;
  readonly condition: BranchCondition;
};

export type CycleTruncation = {
  nodeId: string;
  via: string;
};

export type TaintPath = {
  entryId: string;
  sinkId: string;
  nodes: string[];
  conditions: BranchCondition[];
  entryRegistered: boolean;
  truncations: CycleTruncation[];
};
