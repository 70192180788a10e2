import type { Expression, Relation } from '../ast/nodes.js';
import { expressionToString } from '../ast/render.js';
import { expressionsEqual, forEachExpression, isPathPrefix, relationExpressions, walkRelations } from '../ast/traverse.js';
import { AmbiguousSchemaError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { serializeExpression } from '../normalize/canonical.js';
import type { BoundaryOccurrence } from './boundary.js';

const log = createLogger('cse:schema');

/**
 * One output column of a shared computation.
 * `group` columns are grouping keys (or distinct columns) and are always carried;
 * `output` columns are carried only when some consumer reads them.
 */
export interface SchemaColumn {
	readonly name: string;
	/** Defining expression in the canonical alias space of the boundary core */
	readonly expr: Expression;
	readonly role: 'group' | 'output';
}

export interface SchemaContribution {
	readonly model: string;
	readonly outputs: readonly SchemaColumn[];
	readonly required: readonly string[];
}

export interface UnifiedSchema {
	readonly schema: readonly SchemaColumn[];
	/** Required columns per consumer model, sorted */
	readonly requirements: Readonly<Record<string, readonly string[]>>;
}

/**
 * Boundary outputs the rest of the consumer's tree reads.
 *
 * Column references outside the boundary subtree count when they are unqualified or
 * qualified by a name the site is read through. When nothing is read (say, a bare
 * `count(*)` over the site) the first output by name is kept so the consumer still
 * projects a column and row multiplicity is preserved.
 */
export function requiredColumns(tree: Relation, occurrence: BoundaryOccurrence): string[] {
	const outputs = new Set(occurrence.outputs.map(o => o.name));
	const aliases = new Set(occurrence.siteAliases);
	const read = new Set<string>();

	walkRelations(tree, (node, path) => {
		if (isPathPrefix(occurrence.path, path)) return false;
		forEachExpression(relationExpressions(node), expr => {
			if (expr.type !== 'column') return;
			if (expr.qualifier !== undefined && !aliases.has(expr.qualifier)) return;
			if (outputs.has(expr.name)) read.add(expr.name);
		});
		return true;
	});

	if (read.size === 0 && outputs.size > 0) {
		const [first] = [...outputs].sort();
		read.add(first);
	}
	return [...read].sort();
}

/**
 * Union of group columns and required outputs across contributions.
 * @throws AmbiguousSchemaError when one name has two different definitions
 */
export function unifyColumns(fingerprintKey: string, contributions: readonly SchemaContribution[]): SchemaColumn[] {
	const chosen = new Map<string, SchemaColumn>();
	for (const contribution of contributions) {
		for (const column of contribution.outputs) {
			if (column.role !== 'group' && !contribution.required.includes(column.name)) continue;
			const existing = chosen.get(column.name);
			if (!existing) {
				chosen.set(column.name, column);
				continue;
			}
			if (!expressionsEqual(existing.expr, column.expr)) {
				throw new AmbiguousSchemaError(column.name, fingerprintKey, [
					expressionToString(existing.expr),
					expressionToString(column.expr),
				]);
			}
		}
	}
	return orderSchema([...chosen.values()]);
}

/**
 * Unified schema for a set of occurrences of one boundary.
 * `treeOf` supplies the tree each occurrence's path addresses.
 */
export function unifySchema(
	fingerprintKey: string,
	occurrences: readonly BoundaryOccurrence[],
	treeOf: (model: string) => Relation,
): UnifiedSchema {
	const contributions = occurrences.map(occurrence => ({
		model: occurrence.model,
		outputs: occurrence.outputs,
		required: requiredColumns(treeOf(occurrence.model), occurrence),
	}));
	const schema = unifyColumns(fingerprintKey, contributions);

	const requirements: Record<string, string[]> = {};
	for (const contribution of contributions) {
		requirements[contribution.model] = mergeNames(requirements[contribution.model] ?? [], contribution.required);
	}

	log('Unified %s: %s', fingerprintKey, schema.map(c => c.name).join(', '));
	return { schema, requirements };
}

/**
 * Add one consumer's requirements to an existing schema.
 * @throws AmbiguousSchemaError when a new column collides with an existing definition
 */
export function extendSchema(
	fingerprintKey: string,
	schema: readonly SchemaColumn[],
	contribution: SchemaContribution,
): SchemaColumn[] {
	const existing: SchemaContribution = { model: '', outputs: schema, required: schema.map(c => c.name) };
	return unifyColumns(fingerprintKey, [existing, contribution]);
}

/** Drop outputs no remaining consumer reads; group columns always stay. */
export function shrinkSchema(
	schema: readonly SchemaColumn[],
	requirements: Readonly<Record<string, readonly string[]>>,
): SchemaColumn[] {
	const read = new Set(Object.values(requirements).flat());
	return schema.filter(c => c.role === 'group' || read.has(c.name));
}

export function schemaNames(schema: readonly SchemaColumn[]): string[] {
	return schema.map(c => c.name);
}

export function mergeNames(a: readonly string[], b: readonly string[]): string[] {
	return [...new Set([...a, ...b])].sort();
}

/** Group columns first in canonical expression order, then outputs by name. */
function orderSchema(columns: SchemaColumn[]): SchemaColumn[] {
	const groups = columns
		.filter(c => c.role === 'group')
		.sort((a, b) => compareText(serializeExpression(a.expr), serializeExpression(b.expr)) || compareText(a.name, b.name));
	const outputs = columns
		.filter(c => c.role === 'output')
		.sort((a, b) => compareText(a.name, b.name));
	return [...groups, ...outputs];
}

function compareText(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0;
}
