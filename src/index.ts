// Query trees
export * from './ast/nodes.js';
export * from './ast/build.js';
export {
	collectReferences, collectTables, expressionsEqual, getAtPath, relationsEqual, replaceAtPath, walkRelations,
	type TreePath,
} from './ast/traverse.js';
export { renderSql, relationToString, expressionToString, quoteIdentifier } from './ast/render.js';

// Model graph
export { ModelGraph } from './graph/model-graph.js';
export { isSharedModel, type MaterializationHint, type Model, type ModelInput, type SharedComputationInfo } from './graph/model.js';
export { validateModels, DiagnosticSeverity, type Diagnostic } from './graph/diagnostics.js';

// Normalization
export { normalizeRelation, normalizeExpression, serializeRelation, serializeExpression } from './normalize/canonical.js';
export { foldConstants } from './normalize/const-fold.js';
export { fingerprintRelation, type Fingerprint } from './normalize/fingerprint.js';

// Common subexpressions
export { findBoundaries, type BoundaryCore, type BoundaryOccurrence } from './cse/boundary.js';
export { detectCandidates, subsumes, type CseCandidate, type DetectOptions, type NestedCandidate } from './cse/detector.js';
export { requiredColumns, unifySchema, type SchemaColumn, type UnifiedSchema } from './cse/schema-unifier.js';
export {
	DEFAULT_BACKEND, MaterializationPlanner,
	type BackendCapabilities, type MaterializationPlan, type MaterializationStrategy, type VolumeClass,
} from './cse/materialization-planner.js';
export { buildSharedTree, extractSharedComputation, pruneUnusedCtes } from './cse/rewrite.js';

// Rules
export { RuleRegistry, type OptimizationRule } from './rules/registry.js';
export { RuleEngine, type AppliedRule, type OptimizationResult } from './rules/rule-engine.js';
export { createCseRule, CSE_RULE_ID, type CseMatch } from './rules/cse-rule.js';

// Incremental tracking
export { DependencyTracker, type TrackerReport } from './tracker/dependency-tracker.js';
export { canTransition, type SharedState, type StateTransition } from './tracker/lifecycle.js';

// Optimizer
export { Optimizer, type OptimizerOptions, type OptimizeOptions } from './optimizer.js';
export { OptimizationContext, type OptContext } from './context.js';
export { DEFAULT_TUNING, resolveTuning, type OptimizerTuning, type TuningOverrides } from './optimizer-tuning.js';
export { StaticCatalogStats, prefetchRowEstimates, type CatalogStats } from './stats/catalog.js';

// Errors and logging
export * from './common/errors.js';
export { StatusCode, type SqlValue, type Row, type MaybePromise } from './common/types.js';
export { createLogger, enableLogging, disableLogging, isLoggingEnabled } from './common/logger.js';
