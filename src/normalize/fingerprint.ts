import type { Relation } from '../ast/nodes.js';
import { walkRelations } from '../ast/traverse.js';
import { hashText } from '../util/hash.js';
import { normalizeRelation, serializeRelation } from './canonical.js';

/**
 * Canonical key for a normalized subtree.
 * Equal keys mean equal canonical text over the same source data; callers still
 * confirm with a structural comparison before treating two subtrees as one.
 */
export interface Fingerprint {
	/** Hash of the canonical serialization */
	readonly hash: string;
	/** Base tables (`table:<name>`) and models (`model:<name>`) the subtree reads, sorted */
	readonly sources: readonly string[];
	/** Grouping key combining hash and sources */
	readonly key: string;
}

const cache = new WeakMap<Relation, Fingerprint>();

/**
 * Fingerprint of a tree that is already in canonical form.
 */
export function fingerprintCanonical(canonical: Relation): Fingerprint {
	const cached = cache.get(canonical);
	if (cached) return cached;

	const hash = hashText(serializeRelation(canonical));
	const sources = readSet(canonical);
	const fingerprint: Fingerprint = Object.freeze({
		hash,
		sources: Object.freeze(sources),
		key: `${hash}@${sources.join('+')}`,
	});
	cache.set(canonical, fingerprint);
	return fingerprint;
}

/** Normalize, then fingerprint. */
export function fingerprintRelation(rel: Relation): Fingerprint {
	return fingerprintCanonical(normalizeRelation(rel));
}

function readSet(rel: Relation): string[] {
	const sources = new Set<string>();
	walkRelations(rel, node => {
		if (node.type === 'scan') sources.add(`table:${node.table}`);
		else if (node.type === 'ref') sources.add(`model:${node.model}`);
	});
	return [...sources].sort();
}
