/**
 * Validators module
 *
 * Deterministic structural validation for pipelines.
 */

export {
  validatePipeline,
  checkStructure,
  topologicalSort,
} from './pipeline-validator.js';

export {
  type PipelineStatus,
  type PipelineIssueCode,
  type ValidationIssue,
  type PipelineValidationResult,
  type ValidationError,
  type PipelineValidationOutcome,
  type PipelineGraph,
  type TopologicalSortResult,
  type StructureCheck,
  ACYCLIC_STATUSES,
  PipelineMessages,
  ShapeErrorMessages,
  isValidationError,
} from './pipeline-validator.types.js';
