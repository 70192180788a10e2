/**
 * Structural traversal over the closed query tree node set
 */

import { MisuseError } from '../common/errors.js';
import type { Expression, NamedExpr, Relation, SortKey } from './nodes.js';

/** Child-index path from a root relation to a nested relation. */
export type TreePath = readonly number[];

/**
 * Relational children in a fixed order. Paths index into this list.
 */
export function relationChildren(node: Relation): readonly Relation[] {
	switch (node.type) {
		case 'scan':
		case 'ref':
		case 'cteRef':
			return [];
		case 'subquery':
			return [node.query];
		case 'cte':
			return [node.definition, node.body];
		case 'filter':
		case 'select':
		case 'aggregate':
		case 'sort':
		case 'limit':
			return [node.input];
		case 'join':
			return [node.left, node.right];
	}
}

/**
 * Rebuild a relation with new relational children (same order as relationChildren).
 * Returns the original node when every child is unchanged.
 */
export function withRelationChildren(node: Relation, children: readonly Relation[]): Relation {
	const current = relationChildren(node);
	if (children.length !== current.length) {
		throw new MisuseError(`Expected ${current.length} children for ${node.type}, got ${children.length}`);
	}
	if (current.every((child, i) => child === children[i])) {
		return node;
	}
	switch (node.type) {
		case 'scan':
		case 'ref':
		case 'cteRef':
			return node;
		case 'subquery':
			return Object.freeze({ ...node, query: children[0] });
		case 'cte':
			return Object.freeze({ ...node, definition: children[0], body: children[1] });
		case 'filter':
		case 'select':
		case 'aggregate':
		case 'sort':
		case 'limit':
			return Object.freeze({ ...node, input: children[0] });
		case 'join':
			return Object.freeze({ ...node, left: children[0], right: children[1] });
	}
}

/** Scalar expressions held directly by a relation (not by its children). */
export function relationExpressions(node: Relation): Expression[] {
	switch (node.type) {
		case 'scan':
		case 'ref':
		case 'cteRef':
		case 'subquery':
		case 'cte':
		case 'limit':
			return [];
		case 'filter':
			return [node.predicate];
		case 'select':
			return node.columns.map(c => c.expr);
		case 'aggregate':
			return [...node.groupBy.map(g => g.expr), ...node.aggregates.map(a => a.expr)];
		case 'join':
			return node.on ? [node.on] : [];
		case 'sort':
			return node.keys.map(k => k.expr);
	}
}

export function expressionChildren(expr: Expression): readonly Expression[] {
	switch (expr.type) {
		case 'column':
		case 'literal':
			return [];
		case 'call':
			return expr.args;
		case 'binary':
			return [expr.left, expr.right];
		case 'unary':
			return [expr.operand];
	}
}

/** Visit every expression node (pre-order) beneath the given roots. */
export function forEachExpression(roots: readonly Expression[], visit: (expr: Expression) => void): void {
	const stack = [...roots].reverse();
	while (stack.length > 0) {
		const expr = stack.pop();
		if (!expr) break;
		visit(expr);
		const children = expressionChildren(expr);
		for (let i = children.length - 1; i >= 0; i--) {
			stack.push(children[i]);
		}
	}
}

/**
 * Visit every relation (pre-order) with its path from the root.
 * Returning false from the visitor skips that node's children.
 */
export function walkRelations(root: Relation, visit: (node: Relation, path: TreePath) => boolean | void): void {
	const recurse = (node: Relation, path: TreePath): void => {
		if (visit(node, path) === false) return;
		relationChildren(node).forEach((child, i) => recurse(child, [...path, i]));
	};
	recurse(root, []);
}

export function getAtPath(root: Relation, path: TreePath): Relation {
	let node = root;
	for (const index of path) {
		const children = relationChildren(node);
		if (index < 0 || index >= children.length) {
			throw new MisuseError(`Path [${path.join(',')}] does not address a node under ${root.type}`);
		}
		node = children[index];
	}
	return node;
}

/** Replace the relation at a path, rebuilding only the spine above it. */
export function replaceAtPath(root: Relation, path: TreePath, replacement: Relation): Relation {
	if (path.length === 0) return replacement;
	const [head, ...rest] = path;
	const children = [...relationChildren(root)];
	if (head < 0 || head >= children.length) {
		throw new MisuseError(`Path index ${head} out of range for ${root.type}`);
	}
	children[head] = replaceAtPath(children[head], rest, replacement);
	return withRelationChildren(root, children);
}

export function isPathPrefix(prefix: TreePath, path: TreePath): boolean {
	return prefix.length <= path.length && prefix.every((v, i) => path[i] === v);
}

/** Names of all models referenced anywhere in a tree, sorted and de-duplicated. */
export function collectReferences(root: Relation): string[] {
	const names = new Set<string>();
	walkRelations(root, node => {
		if (node.type === 'ref') names.add(node.model);
	});
	return [...names].sort();
}

/** Names of all base tables scanned anywhere in a tree, sorted and de-duplicated. */
export function collectTables(root: Relation): string[] {
	const names = new Set<string>();
	walkRelations(root, node => {
		if (node.type === 'scan') names.add(node.table);
	});
	return [...names].sort();
}

// --- Structural equality ---

export function expressionsEqual(a: Expression, b: Expression): boolean {
	if (a === b) return true;
	switch (a.type) {
		case 'column':
			return b.type === 'column' && a.name === b.name && a.qualifier === b.qualifier;
		case 'literal':
			return b.type === 'literal' && a.value === b.value;
		case 'call':
			return b.type === 'call'
				&& a.name === b.name
				&& (a.distinct ?? false) === (b.distinct ?? false)
				&& listsEqual(a.args, b.args, expressionsEqual);
		case 'binary':
			return b.type === 'binary'
				&& a.operator === b.operator
				&& expressionsEqual(a.left, b.left)
				&& expressionsEqual(a.right, b.right);
		case 'unary':
			return b.type === 'unary' && a.operator === b.operator && expressionsEqual(a.operand, b.operand);
	}
}

export function relationsEqual(a: Relation, b: Relation): boolean {
	if (a === b) return true;
	switch (a.type) {
		case 'scan':
			return b.type === 'scan' && a.table === b.table && a.alias === b.alias;
		case 'ref':
			return b.type === 'ref' && a.model === b.model && a.alias === b.alias;
		case 'cteRef':
			return b.type === 'cteRef' && a.name === b.name && a.alias === b.alias;
		case 'subquery':
			return b.type === 'subquery' && a.alias === b.alias && relationsEqual(a.query, b.query);
		case 'cte':
			return b.type === 'cte'
				&& a.name === b.name
				&& relationsEqual(a.definition, b.definition)
				&& relationsEqual(a.body, b.body);
		case 'filter':
			return b.type === 'filter' && expressionsEqual(a.predicate, b.predicate) && relationsEqual(a.input, b.input);
		case 'select':
			return b.type === 'select'
				&& a.distinct === b.distinct
				&& listsEqual(a.columns, b.columns, namedEqual)
				&& relationsEqual(a.input, b.input);
		case 'aggregate':
			return b.type === 'aggregate'
				&& listsEqual(a.groupBy, b.groupBy, namedEqual)
				&& listsEqual(a.aggregates, b.aggregates, namedEqual)
				&& relationsEqual(a.input, b.input);
		case 'join':
			return b.type === 'join'
				&& a.kind === b.kind
				&& optionalEqual(a.on, b.on)
				&& relationsEqual(a.left, b.left)
				&& relationsEqual(a.right, b.right);
		case 'sort':
			return b.type === 'sort' && listsEqual(a.keys, b.keys, sortKeysEqual) && relationsEqual(a.input, b.input);
		case 'limit':
			return b.type === 'limit' && a.count === b.count && a.offset === b.offset && relationsEqual(a.input, b.input);
	}
}

export function namedEqual(a: NamedExpr, b: NamedExpr): boolean {
	return a.name === b.name && expressionsEqual(a.expr, b.expr);
}

function sortKeysEqual(a: SortKey, b: SortKey): boolean {
	return a.direction === b.direction && expressionsEqual(a.expr, b.expr);
}

function optionalEqual(a: Expression | undefined, b: Expression | undefined): boolean {
	if (a === undefined || b === undefined) return a === b;
	return expressionsEqual(a, b);
}

function listsEqual<T>(a: readonly T[], b: readonly T[], eq: (x: T, y: T) => boolean): boolean {
	return a.length === b.length && a.every((item, i) => eq(item, b[i]));
}
