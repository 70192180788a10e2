/**
 * Graph rewrites that introduce a shared computation and point consumers at it.
 */

import { aggregate, as, pick, ref, select } from '../ast/build.js';
import type { Relation } from '../ast/nodes.js';
import { relationChildren, replaceAtPath, withRelationChildren } from '../ast/traverse.js';
import { createLogger } from '../common/logger.js';
import type { Model, SharedComputationInfo } from '../graph/model.js';
import type { ModelGraph } from '../graph/model-graph.js';
import type { Fingerprint } from '../normalize/fingerprint.js';
import type { BoundaryCore, BoundaryOccurrence } from './boundary.js';
import type { MaterializationStrategy } from './materialization-planner.js';
import type { SchemaColumn } from './schema-unifier.js';
import { transition } from '../tracker/lifecycle.js';

const log = createLogger('cse:rewrite');

export interface Extraction {
	readonly fingerprint: Fingerprint;
	readonly core: BoundaryCore;
	readonly occurrences: readonly BoundaryOccurrence[];
	readonly schema: readonly SchemaColumn[];
	readonly requirements: Readonly<Record<string, readonly string[]>>;
	readonly strategy: MaterializationStrategy;
}

/**
 * Tree of a shared computation: the canonical core with the schema as its output list.
 */
export function buildSharedTree(core: BoundaryCore, schema: readonly SchemaColumn[]): Relation {
	const named = (columns: readonly SchemaColumn[]) => columns.map(c => as(c.expr, c.name));
	if (core.kind === 'aggregate') {
		return aggregate(
			core.input,
			named(schema.filter(c => c.role === 'group')),
			named(schema.filter(c => c.role === 'output')),
		);
	}
	return select(core.input, named(schema), core.distinctColumns !== undefined);
}

/** The node that stands in for a boundary inside a consumer. */
export function sharedReader(sharedName: string, required: readonly string[]): Relation {
	return select(ref(sharedName), required.map(name => pick(name)));
}

/**
 * Replace each occurrence with a reader of the shared computation, then drop CTE
 * bindings nothing reads any more. Occurrence paths must address disjoint subtrees.
 */
export function rewriteConsumer(
	tree: Relation,
	occurrences: readonly BoundaryOccurrence[],
	sharedName: string,
	required: readonly string[],
): Relation {
	let rewritten = tree;
	for (const occurrence of occurrences) {
		rewritten = replaceAtPath(rewritten, occurrence.path, sharedReader(sharedName, required));
	}
	return pruneUnusedCtes(rewritten);
}

export function pruneUnusedCtes(tree: Relation): Relation {
	const rebuilt = withRelationChildren(tree, relationChildren(tree).map(pruneUnusedCtes));
	if (rebuilt.type === 'cte' && !readsCte(rebuilt.body, rebuilt.name)) {
		log('Pruned unused CTE %s', rebuilt.name);
		return rebuilt.body;
	}
	return rebuilt;
}

function readsCte(rel: Relation, name: string): boolean {
	switch (rel.type) {
		case 'cteRef':
			return rel.name === name;
		case 'cte':
			return readsCte(rel.definition, name) || (rel.name !== name && readsCte(rel.body, name));
		default:
			return relationChildren(rel).some(child => readsCte(child, name));
	}
}

/**
 * First free name of the form `<prefix><hash prefix>`, suffixed on collision.
 */
export function sharedModelName(graph: ModelGraph, fingerprint: Fingerprint, prefix: string): string {
	const base = `${prefix}${fingerprint.hash.slice(0, 8)}`;
	let name = base;
	for (let n = 2; graph.hasModel(name); n++) {
		name = `${base}_${n}`;
	}
	return name;
}

export function nextSequence(graph: ModelGraph): number {
	return graph.sharedComputations().reduce((max, m) => Math.max(max, m.shared.sequence), 0) + 1;
}

/**
 * Add the shared model and rewrite every consumer in one validated step.
 * Returns a new graph; `graph` is left untouched.
 */
export function extractSharedComputation(
	graph: ModelGraph,
	extraction: Extraction,
	prefix: string,
): { graph: ModelGraph; shared: string } {
	const name = sharedModelName(graph, extraction.fingerprint, prefix);
	const tree = buildSharedTree(extraction.core, extraction.schema);
	const consumers = [...new Set(extraction.occurrences.map(o => o.model))].sort();

	const info: SharedComputationInfo = {
		fingerprint: extraction.fingerprint,
		core: extraction.core,
		schema: extraction.schema,
		strategy: extraction.strategy,
		consumers,
		requirements: extraction.requirements,
		state: transition('candidate', 'active'),
		sequence: nextSequence(graph),
	};
	const sharedModel: Model = {
		name,
		sourceTree: tree,
		tree,
		declaredReferences: [],
		hint: 'auto',
		shared: info,
	};

	const upserts: Model[] = [sharedModel];
	for (const consumer of consumers) {
		const model = graph.requireModel(consumer);
		const mine = extraction.occurrences.filter(o => o.model === consumer);
		const required = extraction.requirements[consumer] ?? [];
		upserts.push({ ...model, tree: rewriteConsumer(model.tree, mine, name, required) });
	}

	const next = graph.clone();
	next.applyChanges(upserts, []);
	log('Extracted %s (%s) for %s', name, extraction.strategy, consumers.join(', '));
	return { graph: next, shared: name };
}
