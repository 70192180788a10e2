import type { Relation } from '../ast/nodes.js';
import type { Fingerprint } from '../normalize/fingerprint.js';
import type { BoundaryCore } from '../cse/boundary.js';
import type { SchemaColumn } from '../cse/schema-unifier.js';
import type { MaterializationStrategy } from '../cse/materialization-planner.js';
import type { SharedState } from '../tracker/lifecycle.js';

/** Caller preference for sharing a model's intermediate results. */
export type MaterializationHint = 'auto' | 'always' | 'never';

/**
 * Model as delivered by the parser/loader collaborator.
 */
export interface ModelInput {
	readonly name: string;
	readonly tree: Relation;
	/** Reference names declared by the loader; references found in the tree are always included */
	readonly references?: readonly string[];
	readonly hint?: MaterializationHint;
}

/**
 * Bookkeeping carried by a synthetic shared-computation model.
 */
export interface SharedComputationInfo {
	readonly fingerprint: Fingerprint;
	/** Canonical boundary the shared tree is built from */
	readonly core: BoundaryCore;
	/** Ordered output columns; a superset of every consumer's requirement */
	readonly schema: readonly SchemaColumn[];
	readonly strategy: MaterializationStrategy;
	/** Strategy recommended by the previous pass when it differed from the current one */
	readonly pendingStrategy?: MaterializationStrategy;
	/** Consumer model names, sorted */
	readonly consumers: readonly string[];
	/** Output columns each consumer reads from the shared computation */
	readonly requirements: Readonly<Record<string, readonly string[]>>;
	readonly state: SharedState;
	/** Creation order; replay onto source trees follows it */
	readonly sequence: number;
}

export interface Model {
	readonly name: string;
	/** Tree as authored (or as last edited by the caller) */
	readonly sourceTree: Relation;
	/** Current tree, possibly rewritten to read shared computations */
	readonly tree: Relation;
	readonly declaredReferences: readonly string[];
	readonly hint: MaterializationHint;
	/** Present only on synthetic shared-computation models */
	readonly shared?: SharedComputationInfo;
}

export function isSharedModel(model: Model): model is Model & { readonly shared: SharedComputationInfo } {
	return model.shared !== undefined;
}
