/**
 * Materialization-point boundaries inside a model tree.
 *
 * Sites are CTE definitions and subquery (derived table) roots. At a site a chain of
 * filters is descended, and the first select or aggregate reached is the boundary: a
 * consumer-specific predicate sitting on top of an otherwise shared computation stays
 * with the consumer while the computation beneath it can be shared.
 */

import { aggregate, as, select, subquery } from '../ast/build.js';
import {
	effectiveAlias, type AggregateNode, type Expression, type NamedExpr, type Relation, type SelectNode,
} from '../ast/nodes.js';
import { isPathPrefix, relationChildren, withRelationChildren, walkRelations, type TreePath } from '../ast/traverse.js';
import { createLogger } from '../common/logger.js';
import { normalizeRelation } from '../normalize/canonical.js';
import { fingerprintCanonical, type Fingerprint } from '../normalize/fingerprint.js';
import type { SchemaColumn } from './schema-unifier.js';

const log = createLogger('cse:boundary');

/**
 * The part of a boundary every consumer must agree on: its input and, for
 * aggregates, its group keys. The output list is excluded; it is unified instead.
 * A distinct projection keeps its columns, since they decide which rows exist.
 */
export interface BoundaryCore {
	readonly kind: 'select' | 'aggregate';
	/** Canonical input relation */
	readonly input: Relation;
	/** Canonical group key expressions, in canonical order */
	readonly groupKeys: readonly Expression[];
	readonly distinctColumns?: readonly NamedExpr[];
}

export interface BoundaryOccurrence {
	readonly model: string;
	/** Path of the boundary node (select or aggregate) in the model's tree */
	readonly path: TreePath;
	/** Path of the site root (the CTE definition or subquery query) */
	readonly sitePath: TreePath;
	/** Names the rest of the tree reads the site's rows by */
	readonly siteAliases: readonly string[];
	/** The boundary's own path plus the definitions of every CTE expanded into it */
	readonly coveredPaths: readonly TreePath[];
	readonly core: BoundaryCore;
	/** Output columns in the canonical alias space of the core */
	readonly outputs: readonly SchemaColumn[];
	readonly fingerprint: Fingerprint;
}

interface CteBinding {
	/** Definition with every outer CTE reference already expanded */
	readonly definition: Relation;
	readonly paths: readonly TreePath[];
}

type CteEnv = ReadonlyMap<string, CteBinding>;

/**
 * Relation form of a core, used for fingerprinting and structural comparison.
 */
export function coreRelation(core: BoundaryCore): Relation {
	if (core.kind === 'aggregate') {
		return aggregate(core.input, core.groupKeys.map((expr, i) => as(expr, `_k${i}`)), []);
	}
	return core.distinctColumns
		? select(core.input, core.distinctColumns, true)
		: select(core.input, []);
}

/**
 * Find every eligible boundary in a tree, in pre-order.
 */
export function findBoundaries(tree: Relation, model: string): BoundaryOccurrence[] {
	const found: BoundaryOccurrence[] = [];

	const consider = (siteRoot: Relation, sitePath: TreePath, siteAliases: readonly string[], env: CteEnv): void => {
		let node = siteRoot;
		let path = sitePath;
		while (node.type === 'filter') {
			node = node.input;
			path = [...path, 0];
		}
		if (node.type !== 'select' && node.type !== 'aggregate') return;
		const occurrence = buildOccurrence(model, node, path, sitePath, siteAliases, env);
		if (occurrence) found.push(occurrence);
	};

	const visit = (node: Relation, path: TreePath, env: CteEnv): void => {
		if (node.type === 'cte') {
			const definitionPath = [...path, 0];
			consider(node.definition, definitionPath, [node.name, ...cteAliases(node.body, node.name)], env);
			visit(node.definition, definitionPath, env);
			const expansion = expandCteReferences(node.definition, env);
			const bodyEnv = new Map(env);
			bodyEnv.set(node.name, { definition: expansion.tree, paths: [definitionPath, ...expansion.paths] });
			visit(node.body, [...path, 1], bodyEnv);
			return;
		}
		if (node.type === 'subquery') {
			consider(node.query, [...path, 0], [node.alias], env);
		}
		relationChildren(node).forEach((child, i) => visit(child, [...path, i], env));
	};

	visit(tree, [], new Map());
	log('Model %s: %d boundary occurrence(s)', model, found.length);
	return found;
}

function buildOccurrence(
	model: string,
	node: SelectNode | AggregateNode,
	path: TreePath,
	sitePath: TreePath,
	siteAliases: readonly string[],
	env: CteEnv,
): BoundaryOccurrence | undefined {
	const expansion = expandCteReferences(node, env);
	const canonical = normalizeRelation(expansion.tree);
	let core: BoundaryCore;
	let outputs: SchemaColumn[];

	if (canonical.type === 'aggregate') {
		core = { kind: 'aggregate', input: canonical.input, groupKeys: canonical.groupBy.map(g => g.expr) };
		outputs = [
			...canonical.groupBy.map(g => ({ name: g.name, expr: g.expr, role: 'group' as const })),
			...canonical.aggregates.map(a => ({ name: a.name, expr: a.expr, role: 'output' as const })),
		];
	} else if (canonical.type === 'select') {
		if (isBareSource(canonical.input)) {
			// Projection straight off a source: nothing worth materializing
			return undefined;
		}
		if (canonical.distinct) {
			core = { kind: 'select', input: canonical.input, groupKeys: [], distinctColumns: canonical.columns };
			outputs = canonical.columns.map(c => ({ name: c.name, expr: c.expr, role: 'group' as const }));
		} else {
			core = { kind: 'select', input: canonical.input, groupKeys: [] };
			outputs = canonical.columns.map(c => ({ name: c.name, expr: c.expr, role: 'output' as const }));
		}
	} else {
		return undefined;
	}

	return {
		model,
		path,
		sitePath,
		siteAliases,
		coveredPaths: [path, ...expansion.paths],
		core,
		outputs,
		fingerprint: fingerprintCanonical(coreRelation(core)),
	};
}

function isBareSource(rel: Relation): boolean {
	return rel.type === 'scan' || rel.type === 'ref' || rel.type === 'cteRef';
}

/** Aliases under which a CTE is read inside its body. */
function cteAliases(body: Relation, name: string): string[] {
	const aliases = new Set<string>();
	walkRelations(body, node => {
		if (node.type === 'cteRef' && node.name === name && node.alias !== undefined) {
			aliases.add(node.alias);
		}
	});
	return [...aliases];
}

/**
 * Replace references to CTEs bound outside `rel` with subqueries over their
 * definitions, so the result is self-contained. Names re-bound inside `rel` are
 * left alone.
 */
export function expandCteReferences(rel: Relation, env: CteEnv): { tree: Relation; paths: TreePath[] } {
	const paths: TreePath[] = [];
	if (env.size === 0) return { tree: rel, paths };

	const rewrite = (node: Relation, shadowed: ReadonlySet<string>): Relation => {
		if (node.type === 'cteRef' && !shadowed.has(node.name)) {
			const binding = env.get(node.name);
			if (!binding) return node;
			paths.push(...binding.paths);
			return subquery(binding.definition, effectiveAlias(node));
		}
		if (node.type === 'cte') {
			const definition = rewrite(node.definition, shadowed);
			const body = rewrite(node.body, new Set([...shadowed, node.name]));
			return withRelationChildren(node, [definition, body]);
		}
		return withRelationChildren(node, relationChildren(node).map(child => rewrite(child, shadowed)));
	};

	return { tree: rewrite(rel, new Set()), paths };
}

/** True when `occurrence` sits inside `container` (directly or through an expanded CTE). */
export function isCoveredBy(occurrence: BoundaryOccurrence, container: BoundaryOccurrence): boolean {
	if (occurrence.model !== container.model || occurrence === container) return false;
	return container.coveredPaths.some(prefix => isPathPrefix(prefix, occurrence.path));
}
