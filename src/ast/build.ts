/**
 * Builders for query tree nodes. Every node is frozen on construction.
 */

import type { SqlValue } from '../common/types.js';
import type {
	AggregateNode, BinaryExpr, BinaryOperator, CallExpr, ColumnExpr, CteNode, CteRefNode, Expression,
	FilterNode, JoinKind, JoinNode, LimitNode, LiteralExpr, NamedExpr, RefNode, Relation, ScanNode,
	SelectNode, SortKey, SortNode, SubqueryNode, UnaryExpr, UnaryOperator,
} from './nodes.js';

// --- Expressions ---

export function col(name: string, qualifier?: string): ColumnExpr {
	return Object.freeze(qualifier === undefined ? { type: 'column', name } : { type: 'column', name, qualifier });
}

export function lit(value: SqlValue): LiteralExpr {
	return Object.freeze({ type: 'literal', value });
}

export function call(name: string, ...args: Expression[]): CallExpr {
	return Object.freeze({ type: 'call', name, args: Object.freeze(args) });
}

export function callDistinct(name: string, ...args: Expression[]): CallExpr {
	return Object.freeze({ type: 'call', name, args: Object.freeze(args), distinct: true });
}

export function binary(operator: BinaryOperator, left: Expression, right: Expression): BinaryExpr {
	return Object.freeze({ type: 'binary', operator, left, right });
}

export function unary(operator: UnaryOperator, operand: Expression): UnaryExpr {
	return Object.freeze({ type: 'unary', operator, operand });
}

export const eq = (left: Expression, right: Expression): BinaryExpr => binary('=', left, right);
export const gt = (left: Expression, right: Expression): BinaryExpr => binary('>', left, right);
export const lt = (left: Expression, right: Expression): BinaryExpr => binary('<', left, right);
export const not = (operand: Expression): UnaryExpr => unary('NOT', operand);

/** Left-deep conjunction of one or more predicates. */
export function and(first: Expression, ...rest: Expression[]): Expression {
	return rest.reduce<Expression>((acc, next) => binary('AND', acc, next), first);
}

/** Left-deep disjunction of one or more predicates. */
export function or(first: Expression, ...rest: Expression[]): Expression {
	return rest.reduce<Expression>((acc, next) => binary('OR', acc, next), first);
}

export function as(expr: Expression, name: string): NamedExpr {
	return Object.freeze({ name, expr });
}

/** Shorthand for a column selected under its own name. */
export function pick(name: string, qualifier?: string): NamedExpr {
	return as(col(name, qualifier), name);
}

export function asc(expr: Expression): SortKey {
	return Object.freeze({ expr, direction: 'asc' });
}

export function desc(expr: Expression): SortKey {
	return Object.freeze({ expr, direction: 'desc' });
}

// --- Relations ---

export function scan(table: string, alias?: string): ScanNode {
	return Object.freeze(alias === undefined ? { type: 'scan', table } : { type: 'scan', table, alias });
}

export function ref(model: string, alias?: string): RefNode {
	return Object.freeze(alias === undefined ? { type: 'ref', model } : { type: 'ref', model, alias });
}

export function cteRef(name: string, alias?: string): CteRefNode {
	return Object.freeze(alias === undefined ? { type: 'cteRef', name } : { type: 'cteRef', name, alias });
}

export function subquery(query: Relation, alias: string): SubqueryNode {
	return Object.freeze({ type: 'subquery', query, alias });
}

export function cte(name: string, definition: Relation, body: Relation): CteNode {
	return Object.freeze({ type: 'cte', name, definition, body });
}

/**
 * Bind several CTEs in order over a body: `WITH a AS (...), b AS (...) body`.
 */
export function withCtes(definitions: ReadonlyArray<readonly [string, Relation]>, body: Relation): Relation {
	return definitions.reduceRight<Relation>((acc, [name, definition]) => cte(name, definition, acc), body);
}

export function filter(input: Relation, predicate: Expression): FilterNode {
	return Object.freeze({ type: 'filter', input, predicate });
}

export function select(input: Relation, columns: readonly NamedExpr[], distinct = false): SelectNode {
	return Object.freeze({ type: 'select', input, columns: Object.freeze([...columns]), distinct });
}

export function aggregate(input: Relation, groupBy: readonly NamedExpr[], aggregates: readonly NamedExpr[]): AggregateNode {
	return Object.freeze({
		type: 'aggregate',
		input,
		groupBy: Object.freeze([...groupBy]),
		aggregates: Object.freeze([...aggregates]),
	});
}

export function join(kind: JoinKind, left: Relation, right: Relation, on?: Expression): JoinNode {
	return Object.freeze(on === undefined ? { type: 'join', kind, left, right } : { type: 'join', kind, left, right, on });
}

export function sort(input: Relation, keys: readonly SortKey[]): SortNode {
	return Object.freeze({ type: 'sort', input, keys: Object.freeze([...keys]) });
}

export function limit(input: Relation, count: number, offset = 0): LimitNode {
	return Object.freeze({ type: 'limit', input, count, offset });
}
