/**
 * Pipeline Validator
 *
 * Checks that a pipeline (nodes + edges) is a directed acyclic graph.
 * Pure: no I/O, no shared state. Never throws for any input.
 *
 * @module validators/pipeline-validator
 */

import type { ZodIssue } from "zod";
import { PipelineEdge, PipelineNode, type NodeIdT } from "../schemas/pipeline.js";
import {
  type PipelineGraph,
  type PipelineStatus,
  type PipelineValidationOutcome,
  type PipelineValidationResult,
  type StructureCheck,
  type TopologicalSortResult,
  type ValidationIssue,
  PipelineMessages,
  ShapeErrorMessages,
} from "./pipeline-validator.types.js";

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Format a zod issue path under a root, e.g. ("edges", 3, ["target"]) → "edges[3].target"
 */
function formatIssuePath(root: "nodes" | "edges", index: number, issue: ZodIssue): string {
  return issue.path.reduce<string>(
    (acc, segment) => (typeof segment === "number" ? `${acc}[${segment}]` : `${acc}.${segment}`),
    `${root}[${index}]`,
  );
}

function describeId(id: NodeIdT): string {
  return typeof id === "string" ? `"${id}"` : String(id);
}

/**
 * Compose the human-readable verdict. Shape failures share this path, so a
 * malformed pipeline without edges still reads as isolated nodes.
 */
function composeMessage(numNodes: number, numEdges: number, isDag: boolean): string {
  if (numNodes > 0 && numEdges === 0) return PipelineMessages.ISOLATED_NODES;
  if (!isDag) return PipelineMessages.CYCLIC;
  return PipelineMessages.VALID;
}

// =============================================================================
// Structural checks
// =============================================================================

/**
 * Tier 1: every node is a record with a usable id, ids are unique.
 */
function checkNodes(nodesRaw: unknown[]): StructureCheck {
  const issues: ValidationIssue[] = [];
  const nodeIds: NodeIdT[] = [];
  const firstIndex = new Map<NodeIdT, number>();
  let malformed = false;

  nodesRaw.forEach((raw, index) => {
    const parsed = PipelineNode.safeParse(raw);
    if (!parsed.success) {
      malformed = true;
      const [issue] = parsed.error.issues;
      const path = formatIssuePath("nodes", index, issue);
      issues.push({
        code: "MALFORMED_NODE",
        severity: "error",
        message: `${path}: ${issue.message}`,
        path,
      });
      return;
    }

    const { id } = parsed.data;
    const seenAt = firstIndex.get(id);
    if (seenAt !== undefined) {
      issues.push({
        code: "DUPLICATE_NODE_ID",
        severity: "error",
        message: `Node id ${describeId(id)} is declared more than once`,
        path: `nodes[${index}].id`,
        context: { id, first_index: seenAt },
      });
      return;
    }

    firstIndex.set(id, index);
    nodeIds.push(id);
  });

  if (issues.length > 0) {
    const status: PipelineStatus = malformed ? "malformed_node" : "duplicate_node_id";
    return { ok: false, status, issues };
  }

  return { ok: true, graph: { nodeIds, edges: [] } };
}

/**
 * Tier 2: every edge is a record whose endpoints name declared nodes.
 */
function checkEdges(edgesRaw: unknown[], nodeIds: NodeIdT[]): StructureCheck {
  const known = new Set<NodeIdT>(nodeIds);
  const issues: ValidationIssue[] = [];
  const edges: PipelineGraph["edges"] = [];
  let malformed = false;

  edgesRaw.forEach((raw, index) => {
    const parsed = PipelineEdge.safeParse(raw);
    if (!parsed.success) {
      malformed = true;
      const [issue] = parsed.error.issues;
      const path = formatIssuePath("edges", index, issue);
      issues.push({
        code: "MALFORMED_EDGE",
        severity: "error",
        message: `${path}: ${issue.message}`,
        path,
      });
      return;
    }

    const { source, target } = parsed.data;
    let dangling = false;
    for (const [field, id] of [["source", source], ["target", target]] as const) {
      if (!known.has(id)) {
        dangling = true;
        issues.push({
          code: "DANGLING_REFERENCE",
          severity: "error",
          message: `Edge ${field} ${describeId(id)} does not match any node id`,
          path: `edges[${index}].${field}`,
          context: { field, id },
        });
      }
    }

    if (!dangling) {
      edges.push({ source, target });
    }
  });

  if (issues.length > 0) {
    const status: PipelineStatus = malformed ? "malformed_edge" : "dangling_reference";
    return { ok: false, status, issues };
  }

  return { ok: true, graph: { nodeIds, edges } };
}

/**
 * Run both structural tiers. Edge checks need a trustworthy node set, so
 * they are skipped when the nodes already failed.
 */
export function checkStructure(nodesRaw: unknown[], edgesRaw: unknown[]): StructureCheck {
  const nodeCheck = checkNodes(nodesRaw);
  if (!nodeCheck.ok) return nodeCheck;
  return checkEdges(edgesRaw, nodeCheck.graph.nodeIds);
}

// =============================================================================
// Cycle detection
// =============================================================================

/**
 * Kahn's algorithm. O(N + E).
 *
 * Parallel edges each contribute to in-degree; a self-loop keeps its node
 * from ever reaching zero, so it is reported as unresolved.
 */
export function topologicalSort(graph: PipelineGraph): TopologicalSortResult {
  const inDegree = new Map<NodeIdT, number>();
  const adjacency = new Map<NodeIdT, NodeIdT[]>();

  for (const id of graph.nodeIds) {
    inDegree.set(id, 0);
    adjacency.set(id, []);
  }

  for (const { source, target } of graph.edges) {
    adjacency.get(source)?.push(target);
    inDegree.set(target, (inDegree.get(target) ?? 0) + 1);
  }

  const queue: NodeIdT[] = graph.nodeIds.filter((id) => inDegree.get(id) === 0);
  const order: NodeIdT[] = [];

  // Index cursor instead of shift() keeps dequeue O(1)
  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    order.push(current);

    for (const neighbor of adjacency.get(current) ?? []) {
      const degree = (inDegree.get(neighbor) ?? 0) - 1;
      inDegree.set(neighbor, degree);
      if (degree === 0) queue.push(neighbor);
    }
  }

  const acyclic = order.length === graph.nodeIds.length;
  const unresolved = acyclic ? [] : graph.nodeIds.filter((id) => (inDegree.get(id) ?? 0) > 0);

  return { acyclic, order, unresolved };
}

// =============================================================================
// Entry point
// =============================================================================

function buildResult(
  numNodes: number,
  numEdges: number,
  isDag: boolean,
  message: string,
  status: PipelineStatus,
  issues: ValidationIssue[] = [],
): PipelineValidationResult {
  return { num_nodes: numNodes, num_edges: numEdges, is_dag: isDag, message, status, issues };
}

/**
 * Validate a pipeline given its raw node and edge collections.
 *
 * Non-list inputs yield `{ error }`. Everything else yields a result whose
 * `status` says why `is_dag` is false when it is.
 */
export function validatePipeline(nodesRaw: unknown, edgesRaw: unknown): PipelineValidationOutcome {
  if (!Array.isArray(nodesRaw)) {
    return { error: ShapeErrorMessages.NODES_NOT_LIST };
  }
  if (!Array.isArray(edgesRaw)) {
    return { error: ShapeErrorMessages.EDGES_NOT_LIST };
  }

  const numNodes = nodesRaw.length;
  const numEdges = edgesRaw.length;

  if (numNodes === 0 && numEdges === 0) {
    return buildResult(0, 0, true, PipelineMessages.EMPTY, "empty");
  }
  if (numNodes === 0) {
    return buildResult(0, numEdges, false, PipelineMessages.EDGES_WITHOUT_NODES, "edges_without_nodes");
  }

  const message = (isDag: boolean) => composeMessage(numNodes, numEdges, isDag);

  const structure = checkStructure(nodesRaw, edgesRaw);
  if (!structure.ok) {
    return buildResult(numNodes, numEdges, false, message(false), structure.status, structure.issues);
  }

  const sort = topologicalSort(structure.graph);
  if (!sort.acyclic) {
    const issue: ValidationIssue = {
      code: "CYCLE_DETECTED",
      severity: "error",
      message: `${sort.unresolved.length} node(s) are part of or downstream of a cycle`,
      context: { unresolved: sort.unresolved },
    };
    return buildResult(numNodes, numEdges, false, message(false), "cyclic", [issue]);
  }

  const status: PipelineStatus = numEdges === 0 ? "isolated" : "valid";
  return buildResult(numNodes, numEdges, true, message(true), status);
}
