import { readFile } from "node:fs/promises";
import { CallGraphBuilder, type CallGraph } from "./callGraph.js";
import {
  BranchCondition,
  NodeKind,
  type NodeMetadata,
  type RoleTag,
  type RoleTagObject,
  type SinkType,
  type ValidatorStrength
} from "../types/domain/graph.js";
import { GraphInputError } from "../errors/graph.errors.js";

const KIND_ALIASES: Record<string, NodeKind> = {
  entrypoint: NodeKind.EntryPoint,
  entry: NodeKind.EntryPoint,
  call: NodeKind.Call,
  branch: NodeKind.Branch,
  sink: NodeKind.Sink
};

const CONDITION_ALIASES: Record<string, BranchCondition> = {
  always: BranchCondition.Always,
  never: BranchCondition.Never,
  runtime: BranchCondition.Runtime
};

const SINK_TYPE_ALIASES: Record<string, SinkType> = {
  sql: "SQL",
  template: "Template",
  command: "Command"
};

const STRENGTH_ALIASES: Record<string, ValidatorStrength> = {
  strict: "Strict",
  weak: "Weak",
  none: "None"
};

function toRecord(value: unknown): Record<string, unknown> | null {
  if (!value || typeof value !== "object" || Array.isArray(value)) return null;
  return Object.fromEntries(Object.entries(value));
}

function normalizeKey(value: string): string {
  return value.trim().toLowerCase().replace(/[-_\s]/g, "");
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== "string" || !value.trim()) {
    throw new GraphInputError("expected a non-empty string", field);
  }
  return value.trim();
}

function requireArray(value: unknown, field: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new GraphInputError("expected an array", field);
  }
  return value;
}

function parseKind(value: unknown, field: string): NodeKind {
  const raw = requireString(value, field);
  const kind = KIND_ALIASES[normalizeKey(raw)];
  if (!kind) {
    throw new GraphInputError(`unknown node kind "${raw}"`, field);
  }
  return kind;
}

function parseCondition(value: unknown, field: string): BranchCondition {
  if (value === undefined || value === null) return BranchCondition.Always;
  const raw = requireString(value, field);
  const condition = CONDITION_ALIASES[normalizeKey(raw)];
  if (!condition) {
    throw new GraphInputError(`unknown branch condition "${raw}"`, field);
  }
  return condition;
}

function parseStringList(value: unknown, field: string): string[] {
  return requireArray(value, field).map((item, index) => requireString(item, `${field}[${index}]`));
}

function parseRoleTags(value: unknown, field: string): RoleTag[] {
  if (value === undefined || value === null) return [];
  return requireArray(value, field).map((item, index): RoleTag => {
    const itemField = `${field}[${index}]`;
    if (typeof item === "string") return requireString(item, itemField);
    const record = toRecord(item);
    if (!record) {
      throw new GraphInputError("expected a string or an object with a role", itemField);
    }
    const tag: RoleTagObject = { role: requireString(record.role, `${itemField}.role`) };
    if (record.strength !== undefined) {
      tag.strength = requireString(record.strength, `${itemField}.strength`);
    }
    if (record.protects !== undefined) {
      tag.protects = parseStringList(record.protects, `${itemField}.protects`);
    }
    return tag;
  });
}

function parseMetadata(value: unknown, field: string): NodeMetadata {
  if (value === undefined || value === null) return {};
  const record = toRecord(value);
  if (!record) {
    throw new GraphInputError("expected an object", field);
  }
  const { sinkType, strength, protects } = record;
  const metadata: NodeMetadata = {};
  for (const [key, entry] of Object.entries(record)) {
    if (key === "sinkType" || key === "strength" || key === "protects") continue;
    metadata[key] = entry;
  }
  if (sinkType !== undefined) {
    const raw = requireString(sinkType, `${field}.sinkType`);
    metadata.sinkType = SINK_TYPE_ALIASES[normalizeKey(raw)] ?? "Other";
  }
  if (strength !== undefined) {
    const raw = requireString(strength, `${field}.strength`);
    const normalized = STRENGTH_ALIASES[normalizeKey(raw)];
    if (!normalized) {
      throw new GraphInputError(`unknown validator strength "${raw}"`, `${field}.strength`);
    }
    metadata.strength = normalized;
  }
  if (protects !== undefined) {
    metadata.protects = parseStringList(protects, `${field}.protects`);
  }
  return metadata;
}

/**
 * Builds a graph from the document shape produced by call-graph front ends:
 * `{ nodes: [{ id, kind, roleTags?, metadata?, label? }], edges: [{ from, to, condition? }],
 * registeredEntryPoints: [id] }`. Structural problems surface as the builder's errors.
 */
export function buildGraphFromDocument(document: unknown): CallGraph {
  const root = toRecord(document);
  if (!root) {
    throw new GraphInputError("expected a JSON object with nodes and edges");
  }

  const builder = new CallGraphBuilder();
  const nodes = requireArray(root.nodes, "nodes");
  nodes.forEach((item, index) => {
    const field = `nodes[${index}]`;
    const record = toRecord(item);
    if (!record) throw new GraphInputError("expected an object", field);
    builder.addNode({
      id: requireString(record.id, `${field}.id`),
      kind: parseKind(record.kind, `${field}.kind`),
      roleTags: parseRoleTags(record.roleTags, `${field}.roleTags`),
      metadata: parseMetadata(record.metadata, `${field}.metadata`),
      ...(record.label !== undefined ? { label: requireString(record.label, `${field}.label`) } : {})
    });
  });

  const edges = root.edges === undefined ? [] : requireArray(root.edges, "edges");
  edges.forEach((item, index) => {
    const field = `edges[${index}]`;
    const record = toRecord(item);
    if (!record) throw new GraphInputError("expected an object", field);
    builder.addEdge(
      requireString(record.from, `${field}.from`),
      requireString(record.to, `${field}.to`),
      parseCondition(record.condition, `${field}.condition`)
    );
  });

  const registered =
    root.registeredEntryPoints === undefined
      ? []
      : parseStringList(root.registeredEntryPoints, "registeredEntryPoints");
  for (const id of registered) {
    builder.markEntryRegistered(id);
  }

  return builder.build();
}

export async function loadGraphFile(filePath: string): Promise<CallGraph> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new GraphInputError(`cannot read ${filePath} (${message})`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new GraphInputError(`not valid JSON (${message})`);
  }
  return buildGraphFromDocument(parsed);
}
