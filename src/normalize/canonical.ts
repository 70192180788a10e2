/**
 * Canonical form for query trees.
 *
 * Two subtrees that compute the same rows up to alias naming and the ordering of
 * order-irrelevant operands normalize to structurally equal trees:
 * - relation aliases and CTE names become position-based identifiers (_t0, _t1, ... and
 *   _c0, _c1, ...) assigned in traversal order, scope by scope; column qualifiers follow
 *   and qualifiers bound outside the subtree are left alone
 * - AND/OR chains are flattened, de-duplicated and sorted; =, <>, + and * order their
 *   operands; > and >= become < and <= with swapped operands
 * - group keys and selected-column sets are sorted; sort keys and function arguments keep
 *   their order; function names are lower-cased
 * - constant subexpressions are folded first
 */

import {
	aggregate, as, binary, call, callDistinct, col, cte, cteRef, filter, join, limit, ref, scan, select, sort, subquery, unary,
} from '../ast/build.js';
import { effectiveAlias, type BinaryOperator, type Expression, type NamedExpr, type Relation } from '../ast/nodes.js';
import { foldConstants } from './const-fold.js';

type AliasMap = ReadonlyMap<string, string>;

const COMMUTATIVE = new Set<BinaryOperator>(['=', '<>', '+', '*']);
const FLIPPED: Partial<Record<BinaryOperator, BinaryOperator>> = { '>': '<', '>=': '<=' };

const relationCache = new WeakMap<Relation, Relation>();

/**
 * Canonical form of a relation subtree. Results are memoized per node identity.
 */
export function normalizeRelation(root: Relation): Relation {
	const cached = relationCache.get(root);
	if (cached) return cached;
	const result = new Canonicalizer().relation(root, new Map(), new Map()).node;
	relationCache.set(root, result);
	return result;
}

/**
 * Canonical form of an expression whose qualifiers are resolved through `aliases`.
 */
export function normalizeExpression(expr: Expression, aliases: AliasMap = new Map()): Expression {
	return canonicalExpression(foldConstants(expr), aliases);
}

interface Normalized {
	node: Relation;
	/** Aliases (original -> canonical) this relation exposes to its parent */
	exposed: Map<string, string>;
}

class Canonicalizer {
	private relationCount = 0;
	private cteCount = 0;

	relation(node: Relation, ctes: AliasMap, outer: AliasMap): Normalized {
		switch (node.type) {
			case 'scan': {
				const alias = this.nextRelationAlias();
				return { node: scan(node.table, alias), exposed: new Map([[effectiveAlias(node), alias]]) };
			}
			case 'ref': {
				const alias = this.nextRelationAlias();
				return { node: ref(node.model, alias), exposed: new Map([[effectiveAlias(node), alias]]) };
			}
			case 'cteRef': {
				const alias = this.nextRelationAlias();
				const name = ctes.get(node.name) ?? node.name;
				return { node: cteRef(name, alias), exposed: new Map([[effectiveAlias(node), alias]]) };
			}
			case 'subquery': {
				const inner = this.relation(node.query, ctes, outer);
				const alias = this.nextRelationAlias();
				return { node: subquery(inner.node, alias), exposed: new Map([[node.alias, alias]]) };
			}
			case 'cte': {
				const name = `_c${this.cteCount++}`;
				const definition = this.relation(node.definition, ctes, outer);
				const scoped = new Map(ctes);
				scoped.set(node.name, name);
				const body = this.relation(node.body, scoped, outer);
				return { node: cte(name, definition.node, body.node), exposed: body.exposed };
			}
			case 'filter': {
				const input = this.relation(node.input, ctes, outer);
				const scope = mergeAliases(outer, input.exposed);
				return { node: filter(input.node, normalizeExpression(node.predicate, scope)), exposed: input.exposed };
			}
			case 'select': {
				const input = this.relation(node.input, ctes, outer);
				const scope = mergeAliases(outer, input.exposed);
				const columns = sortNamed(node.columns.map(c => normalizeNamed(c, scope)), byName);
				return { node: select(input.node, columns, node.distinct), exposed: new Map() };
			}
			case 'aggregate': {
				const input = this.relation(node.input, ctes, outer);
				const scope = mergeAliases(outer, input.exposed);
				const groupBy = sortNamed(node.groupBy.map(g => normalizeNamed(g, scope)), byExpression);
				const aggregates = sortNamed(node.aggregates.map(a => normalizeNamed(a, scope)), byName);
				return { node: aggregate(input.node, groupBy, aggregates), exposed: new Map() };
			}
			case 'join': {
				const left = this.relation(node.left, ctes, outer);
				const right = this.relation(node.right, ctes, outer);
				const exposed = mergeAliases(left.exposed, right.exposed);
				const on = node.on ? normalizeExpression(node.on, mergeAliases(outer, exposed)) : undefined;
				return { node: join(node.kind, left.node, right.node, on), exposed };
			}
			case 'sort': {
				const input = this.relation(node.input, ctes, outer);
				const scope = mergeAliases(outer, input.exposed);
				const keys = node.keys.map(k => ({ expr: normalizeExpression(k.expr, scope), direction: k.direction }));
				return { node: sort(input.node, keys), exposed: input.exposed };
			}
			case 'limit': {
				const input = this.relation(node.input, ctes, outer);
				return { node: limit(input.node, node.count, node.offset), exposed: input.exposed };
			}
		}
	}

	private nextRelationAlias(): string {
		return `_t${this.relationCount++}`;
	}
}

function mergeAliases(base: AliasMap, overlay: AliasMap): Map<string, string> {
	const merged = new Map(base);
	for (const [k, v] of overlay) merged.set(k, v);
	return merged;
}

function normalizeNamed(named: NamedExpr, scope: AliasMap): NamedExpr {
	return as(normalizeExpression(named.expr, scope), named.name);
}

const byName = (a: NamedExpr, b: NamedExpr): number =>
	compareText(a.name, b.name) || compareText(serializeExpression(a.expr), serializeExpression(b.expr));

const byExpression = (a: NamedExpr, b: NamedExpr): number =>
	compareText(serializeExpression(a.expr), serializeExpression(b.expr)) || compareText(a.name, b.name);

function sortNamed(list: NamedExpr[], compare: (a: NamedExpr, b: NamedExpr) => number): NamedExpr[] {
	return [...list].sort(compare);
}

function canonicalExpression(expr: Expression, aliases: AliasMap): Expression {
	switch (expr.type) {
		case 'literal':
			return expr;
		case 'column': {
			if (expr.qualifier === undefined) return expr;
			return col(expr.name, aliases.get(expr.qualifier) ?? expr.qualifier);
		}
		case 'call': {
			const args = expr.args.map(a => canonicalExpression(a, aliases));
			const name = expr.name.toLowerCase();
			return expr.distinct ? callDistinct(name, ...args) : call(name, ...args);
		}
		case 'unary':
			return unary(expr.operator, canonicalExpression(expr.operand, aliases));
		case 'binary': {
			const op = expr.operator;
			if (op === 'AND' || op === 'OR') {
				const operands = flatten(op, expr).map(e => canonicalExpression(e, aliases));
				const unique = new Map<string, Expression>();
				for (const operand of operands) {
					// Canonical operands may themselves be same-op chains; splice them in
					for (const part of flatten(op, operand)) {
						unique.set(serializeExpression(part), part);
					}
				}
				const sorted = [...unique.entries()].sort(([a], [b]) => compareText(a, b)).map(([, e]) => e);
				return sorted.slice(1).reduce<Expression>((acc, next) => binary(op, acc, next), sorted[0]);
			}
			let left = canonicalExpression(expr.left, aliases);
			let right = canonicalExpression(expr.right, aliases);
			let operator: BinaryOperator = op;
			const flipped = FLIPPED[op];
			if (flipped) {
				[left, right] = [right, left];
				operator = flipped;
			}
			if (COMMUTATIVE.has(operator) && compareText(serializeExpression(left), serializeExpression(right)) > 0) {
				[left, right] = [right, left];
			}
			return binary(operator, left, right);
		}
	}
}

function flatten(op: 'AND' | 'OR', expr: Expression): Expression[] {
	if (expr.type === 'binary' && expr.operator === op) {
		return [...flatten(op, expr.left), ...flatten(op, expr.right)];
	}
	return [expr];
}

function compareText(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0;
}

// --- Serialization ---

const expressionText = new WeakMap<Expression, string>();
const relationText = new WeakMap<Relation, string>();

/** Stable text form of an expression (exact, not normalized). */
export function serializeExpression(expr: Expression): string {
	const cached = expressionText.get(expr);
	if (cached !== undefined) return cached;
	const text = expressionTextOf(expr);
	expressionText.set(expr, text);
	return text;
}

function expressionTextOf(expr: Expression): string {
	switch (expr.type) {
		case 'column':
			return expr.qualifier === undefined ? `(col ${JSON.stringify(expr.name)})` : `(col ${JSON.stringify(expr.qualifier)} ${JSON.stringify(expr.name)})`;
		case 'literal':
			return `(lit ${expr.value === null ? 'null' : `${typeof expr.value}:${JSON.stringify(expr.value)}`})`;
		case 'call':
			return `(call ${JSON.stringify(expr.name)}${expr.distinct ? ' distinct' : ''}${expr.args.map(a => ' ' + serializeExpression(a)).join('')})`;
		case 'binary':
			return `(${expr.operator} ${serializeExpression(expr.left)} ${serializeExpression(expr.right)})`;
		case 'unary':
			return `(${expr.operator} ${serializeExpression(expr.operand)})`;
	}
}

function serializeNamed(list: readonly NamedExpr[]): string {
	return `[${list.map(n => `${JSON.stringify(n.name)}=${serializeExpression(n.expr)}`).join(' ')}]`;
}

/** Stable text form of a relation (exact, not normalized). */
export function serializeRelation(rel: Relation): string {
	const cached = relationText.get(rel);
	if (cached !== undefined) return cached;
	const text = relationTextOf(rel);
	relationText.set(rel, text);
	return text;
}

const aliasText = (a: string | undefined): string => (a === undefined ? '' : ` as ${JSON.stringify(a)}`);

function relationTextOf(rel: Relation): string {
	switch (rel.type) {
		case 'scan':
			return `(scan ${JSON.stringify(rel.table)}${aliasText(rel.alias)})`;
		case 'ref':
			return `(ref ${JSON.stringify(rel.model)}${aliasText(rel.alias)})`;
		case 'cteRef':
			return `(cteRef ${JSON.stringify(rel.name)}${aliasText(rel.alias)})`;
		case 'subquery':
			return `(subquery ${serializeRelation(rel.query)} as ${JSON.stringify(rel.alias)})`;
		case 'cte':
			return `(cte ${JSON.stringify(rel.name)} ${serializeRelation(rel.definition)} ${serializeRelation(rel.body)})`;
		case 'filter':
			return `(filter ${serializeExpression(rel.predicate)} ${serializeRelation(rel.input)})`;
		case 'select':
			return `(select${rel.distinct ? ' distinct' : ''} ${serializeNamed(rel.columns)} ${serializeRelation(rel.input)})`;
		case 'aggregate':
			return `(aggregate ${serializeNamed(rel.groupBy)} ${serializeNamed(rel.aggregates)} ${serializeRelation(rel.input)})`;
		case 'join':
			return `(join ${rel.kind}${rel.on ? ' ' + serializeExpression(rel.on) : ''} ${serializeRelation(rel.left)} ${serializeRelation(rel.right)})`;
		case 'sort':
			return `(sort [${rel.keys.map(k => `${k.direction} ${serializeExpression(k.expr)}`).join(' ')}] ${serializeRelation(rel.input)})`;
		case 'limit':
			return `(limit ${rel.count} ${rel.offset} ${serializeRelation(rel.input)})`;
	}
}
