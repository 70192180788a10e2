/**
 * Cross-model common subexpression detection.
 *
 * Every non-synthetic model is scanned independently for boundary occurrences; the
 * results meet at a single grouping step keyed by fingerprint, where hash matches are
 * confirmed structurally before two occurrences count as the same computation.
 */

import type { Relation } from '../ast/nodes.js';
import { relationsEqual } from '../ast/traverse.js';
import { createLogger } from '../common/logger.js';
import { isSharedModel } from '../graph/model.js';
import type { ModelGraph } from '../graph/model-graph.js';
import type { Fingerprint } from '../normalize/fingerprint.js';
import { coreRelation, findBoundaries, isCoveredBy, type BoundaryOccurrence } from './boundary.js';

const log = createLogger('cse:detector');

export interface CseCandidate {
	readonly fingerprint: Fingerprint;
	/** Sorted by model name, then by position in the tree */
	readonly occurrences: readonly BoundaryOccurrence[];
	/** Distinct consumer model names, sorted */
	readonly consumers: readonly string[];
}

export interface DetectOptions {
	/** Models left out of the scan entirely */
	readonly exclude?: (model: string) => boolean;
	/**
	 * Keep candidates nested inside another candidate with the same consumers. Callers
	 * that may still reject the outer one resolve nesting themselves with `subsumes`.
	 */
	readonly keepNested?: boolean;
}

export function detectCandidates(graph: ModelGraph, options: DetectOptions = {}): CseCandidate[] {
	const perModel = graph.allModels()
		.filter(model => !isSharedModel(model) && !(options.exclude?.(model.name) ?? false))
		.map(model => findBoundaries(model.tree, model.name));

	// Grouping point
	const byKey = new Map<string, BoundaryOccurrence[]>();
	for (const occurrences of perModel) {
		for (const occurrence of occurrences) {
			const bucket = byKey.get(occurrence.fingerprint.key);
			if (bucket) bucket.push(occurrence);
			else byKey.set(occurrence.fingerprint.key, [occurrence]);
		}
	}

	const verified: CseCandidate[] = [];
	for (const bucket of byKey.values()) {
		for (const group of partitionByStructure(bucket)) {
			const consumers = [...new Set(group.map(o => o.model))].sort();
			if (consumers.length < 2) continue;
			verified.push({
				fingerprint: group[0].fingerprint,
				occurrences: [...group].sort(compareOccurrences),
				consumers,
			});
		}
	}

	const candidates = (options.keepNested ? verified : dropSubsumed(verified)).sort(compareCandidates);
	log('Detected %d candidate(s) from %d fingerprint group(s)', candidates.length, byKey.size);
	return candidates;
}

/** Split a hash bucket into groups whose canonical cores are structurally equal. */
function partitionByStructure(bucket: readonly BoundaryOccurrence[]): BoundaryOccurrence[][] {
	const groups: Array<{ core: Relation; members: BoundaryOccurrence[] }> = [];
	for (const occurrence of bucket) {
		const core = coreRelation(occurrence.core);
		const group = groups.find(g => relationsEqual(g.core, core));
		if (group) {
			group.members.push(occurrence);
		} else {
			if (groups.length > 0) {
				log('Fingerprint collision on %s', occurrence.fingerprint.key);
			}
			groups.push({ core, members: [occurrence] });
		}
	}
	return groups.map(g => g.members);
}

/** Consumers and occurrences of a candidate, as far as nesting is concerned. */
export interface NestedCandidate {
	readonly consumers: readonly string[];
	readonly occurrences: readonly BoundaryOccurrence[];
}

/**
 * True when `outer` has the same consumers as `inner` and every occurrence of
 * `inner` sits inside one of `outer`.
 */
export function subsumes(outer: NestedCandidate, inner: NestedCandidate): boolean {
	return outer !== inner
		&& sameMembers(outer.consumers, inner.consumers)
		&& inner.occurrences.every(o => outer.occurrences.some(container => isCoveredBy(o, container)));
}

/** The outermost shared boundary wins. */
function dropSubsumed(candidates: readonly CseCandidate[]): CseCandidate[] {
	return candidates.filter(inner => !candidates.some(outer => subsumes(outer, inner)));
}

function sameMembers(a: readonly string[], b: readonly string[]): boolean {
	return a.length === b.length && a.every((name, i) => name === b[i]);
}

function compareOccurrences(a: BoundaryOccurrence, b: BoundaryOccurrence): number {
	if (a.model !== b.model) return a.model < b.model ? -1 : 1;
	const length = Math.min(a.path.length, b.path.length);
	for (let i = 0; i < length; i++) {
		if (a.path[i] !== b.path[i]) return a.path[i] - b.path[i];
	}
	return a.path.length - b.path.length;
}

function compareCandidates(a: CseCandidate, b: CseCandidate): number {
	if (a.fingerprint.key !== b.fingerprint.key) return a.fingerprint.key < b.fingerprint.key ? -1 : 1;
	const first = (c: CseCandidate): string => c.consumers[0] ?? '';
	return first(a) < first(b) ? -1 : first(a) > first(b) ? 1 : 0;
}
