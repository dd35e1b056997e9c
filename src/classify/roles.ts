import type { CallGraph } from "../graph/callGraph.js";
import type { GraphNode, RoleTag, ValidatorStrength } from "../types/domain/graph.js";
import { Role } from "../types/domain/verdict.js";
import { UnclassifiableRoleError } from "../errors/classification.errors.js";

export type RoleTrait = {
  role: Role;
  strength: ValidatorStrength;
  /** Vulnerability classes covered; empty means every class. */
  protects: string[];
};

export type RoleAssignment = {
  nodeId: string;
  role: Role;
  traits: RoleTrait[];
  warnings: UnclassifiableRoleError[];
};

export type ClassifiedGraph = {
  graph: CallGraph;
  roles: ReadonlyMap<string, RoleAssignment>;
  warnings: UnclassifiableRoleError[];
};

const ROLE_ALIASES: Record<string, Role> = {
  source: Role.Source,
  sanitizer: Role.Sanitizer,
  sanitiser: Role.Sanitizer,
  validator: Role.Validator,
  authzgate: Role.AuthzGate,
  ratelimiter: Role.RateLimiter,
  deadguard: Role.DeadGuard,
  plain: Role.None,
  plaincall: Role.None,
  none: Role.None
};

const STRENGTHS: Record<string, ValidatorStrength> = {
  strict: "Strict",
  weak: "Weak",
  none: "None"
};

function normalizeKey(value: string): string {
  return value.trim().toLowerCase().replace(/[-_\s]/g, "");
}

function normalizeProtects(values: readonly string[] | undefined): string[] {
  if (!values) return [];
  return Array.from(new Set(values.map((value) => value.trim().toLowerCase()).filter(Boolean))).sort();
}

// Higher wins when a node declares several roles.
function traitRank(trait: RoleTrait): number {
  switch (trait.role) {
    case Role.DeadGuard:
      return 8;
    case Role.Sanitizer:
      return 7;
    case Role.Validator:
      if (trait.strength === "Strict") return 6;
      if (trait.strength === "Weak") return 4;
      return 2;
    case Role.AuthzGate:
      return 5;
    case Role.RateLimiter:
      return 3;
    case Role.Source:
      return 1;
    default:
      return 0;
  }
}

function describeTag(tag: RoleTag): string {
  if (typeof tag === "string") return tag;
  return tag.strength ? `${tag.role}:${tag.strength}` : tag.role;
}

type ResolvedTag = {
  trait: RoleTrait | null;
  warning: UnclassifiableRoleError | null;
};

function resolveTag(node: GraphNode, tag: RoleTag): ResolvedTag {
  const [rawRole, rawStrength] =
    typeof tag === "string" ? tag.split(":", 2) : [tag.role, tag.strength];
  const role = ROLE_ALIASES[normalizeKey(rawRole ?? "")];
  const unknownTag = (): ResolvedTag => ({
    trait: null,
    warning: new UnclassifiableRoleError(node.id, describeTag(tag))
  });
  if (!role) return unknownTag();

  const declared = rawStrength ?? (role === Role.Validator ? node.metadata.strength : undefined);
  const resolved = declared === undefined ? undefined : STRENGTHS[normalizeKey(declared)];
  if (declared !== undefined && !resolved) return unknownTag();

  const protects = typeof tag === "string" ? undefined : tag.protects;
  const trait: RoleTrait = {
    role,
    // Strength only grades validators; other roles ignore a declared one.
    strength: role === Role.Validator ? (resolved ?? "None") : "None",
    protects: normalizeProtects(protects ?? node.metadata.protects)
  };
  const warning =
    role === Role.Validator && resolved === undefined
      ? new UnclassifiableRoleError(
          node.id,
          describeTag(tag),
          `Node "${node.id}" declares validator tag "${describeTag(tag)}" without a strength; treated as no validation.`
        )
      : null;
  return { trait, warning };
}

/**
 * Resolves a node's role from its declared tags only. Labels and ids never take part:
 * a function called `safeQuery` with no tags is a plain call.
 */
export function classifyNode(node: GraphNode): RoleAssignment {
  const traits: RoleTrait[] = [];
  const warnings: UnclassifiableRoleError[] = [];

  for (const tag of node.roleTags) {
    const { trait, warning } = resolveTag(node, tag);
    if (warning) warnings.push(warning);
    if (!trait || trait.role === Role.None) continue;
    traits.push(trait);
  }

  let role: Role = Role.None;
  let best = 0;
  for (const trait of traits) {
    const rank = traitRank(trait);
    if (rank > best) {
      best = rank;
      role = trait.role;
    }
  }

  return { nodeId: node.id, role, traits, warnings };
}

export function classifyGraph(graph: CallGraph): ClassifiedGraph {
  const roles = new Map<string, RoleAssignment>();
  const warnings: UnclassifiableRoleError[] = [];
  for (const node of graph.nodes) {
    const assignment = classifyNode(node);
    roles.set(node.id, assignment);
    warnings.push(...assignment.warnings);
  }
  return { graph, roles, warnings };
}

export function roleOf(classified: ClassifiedGraph, nodeId: string): RoleAssignment {
  return classified.roles.get(nodeId) ?? { nodeId, role: Role.None, traits: [], warnings: [] };
}
