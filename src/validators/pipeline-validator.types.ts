/**
 * Pipeline Validator Types
 *
 * @module validators/pipeline-validator.types
 */

import type { NodeIdT } from "../schemas/pipeline.js";

// =============================================================================
// Verdicts
// =============================================================================

/**
 * Tagged verdict for a validated pipeline.
 *
 * `is_dag` is true exactly for `empty`, `isolated` and `valid`.
 */
export type PipelineStatus =
  | "empty"
  | "edges_without_nodes"
  | "isolated"
  | "valid"
  | "cyclic"
  | "malformed_node"
  | "duplicate_node_id"
  | "malformed_edge"
  | "dangling_reference";

export const ACYCLIC_STATUSES: ReadonlySet<PipelineStatus> = new Set<PipelineStatus>([
  "empty",
  "isolated",
  "valid",
]);

// =============================================================================
// Issues
// =============================================================================

export type PipelineIssueCode =
  | "MALFORMED_NODE"
  | "DUPLICATE_NODE_ID"
  | "MALFORMED_EDGE"
  | "DANGLING_REFERENCE"
  | "CYCLE_DETECTED";

export interface ValidationIssue {
  code: PipelineIssueCode;
  severity: "error";
  message: string;
  /** Location in the input, e.g. 'nodes[2]' or 'edges[0].target' */
  path?: string;
  context?: Record<string, unknown>;
}

// =============================================================================
// Messages
// =============================================================================

export const PipelineMessages = {
  EMPTY: "Empty pipeline - no nodes or edges",
  EDGES_WITHOUT_NODES: "Invalid pipeline - edges exist without nodes",
  ISOLATED_NODES: "Pipeline contains only isolated nodes",
  CYCLIC: "Pipeline contains cycles and is not a valid DAG",
  VALID: "Valid pipeline structure",
} as const;

export const ShapeErrorMessages = {
  NODES_NOT_LIST: "Nodes data must be a list",
  EDGES_NOT_LIST: "Edges data must be a list",
} as const;

// =============================================================================
// Results
// =============================================================================

/**
 * Response body for a pipeline that could be checked. Field names are the
 * wire contract.
 */
export interface PipelineValidationResult {
  num_nodes: number;
  num_edges: number;
  is_dag: boolean;
  message: string;
  status: PipelineStatus;
  issues: ValidationIssue[];
}

/**
 * Decode, shape or unclassified failure.
 */
export interface ValidationError {
  error: string;
}

export type PipelineValidationOutcome = PipelineValidationResult | ValidationError;

export function isValidationError(outcome: PipelineValidationOutcome): outcome is ValidationError {
  return "error" in outcome;
}

// =============================================================================
// Graph structures
// =============================================================================

/**
 * Well-formed graph after shape checks. Ids are kept in declaration order.
 */
export interface PipelineGraph {
  nodeIds: NodeIdT[];
  edges: Array<{ source: NodeIdT; target: NodeIdT }>;
}

export interface TopologicalSortResult {
  acyclic: boolean;
  /** Processed node ids, in Kahn order */
  order: NodeIdT[];
  /** Ids never reaching in-degree 0, in declaration order */
  unresolved: NodeIdT[];
}

export type StructureCheck =
  | { ok: true; graph: PipelineGraph }
  | { ok: false; status: PipelineStatus; issues: ValidationIssue[] };
