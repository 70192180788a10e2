import type { SqlValue } from '../common/types.js';

/**
 * Query tree definitions.
 *
 * The node set is closed: every consumer switches over `type` and the compiler checks
 * exhaustiveness. Nodes are frozen when built (see build.ts) and never mutated; a
 * transformation always produces new nodes.
 */

// --- Expressions ---

export type Expression = ColumnExpr | LiteralExpr | CallExpr | BinaryExpr | UnaryExpr;

// Column reference, optionally qualified by a relation alias
export interface ColumnExpr {
	readonly type: 'column';
	readonly name: string;
	readonly qualifier?: string;
}

export interface LiteralExpr {
	readonly type: 'literal';
	readonly value: SqlValue;
}

// Scalar or aggregate function call; count() with no arguments means count(*)
export interface CallExpr {
	readonly type: 'call';
	readonly name: string;
	readonly args: readonly Expression[];
	readonly distinct?: boolean;
}

export type BinaryOperator =
	| 'AND' | 'OR'
	| '=' | '<>' | '<' | '<=' | '>' | '>='
	| '+' | '-' | '*' | '/' | '%' | '||';

export interface BinaryExpr {
	readonly type: 'binary';
	readonly operator: BinaryOperator;
	readonly left: Expression;
	readonly right: Expression;
}

export type UnaryOperator = 'NOT' | '-' | 'IS NULL' | 'IS NOT NULL';

export interface UnaryExpr {
	readonly type: 'unary';
	readonly operator: UnaryOperator;
	readonly operand: Expression;
}

/** An output column: a defining expression and the name consumers read it by. */
export interface NamedExpr {
	readonly name: string;
	readonly expr: Expression;
}

export interface SortKey {
	readonly expr: Expression;
	readonly direction: 'asc' | 'desc';
}

// --- Relations ---

export type Relation =
	| ScanNode
	| RefNode
	| CteRefNode
	| SubqueryNode
	| CteNode
	| FilterNode
	| SelectNode
	| AggregateNode
	| JoinNode
	| SortNode
	| LimitNode;

export type RelationType = Relation['type'];

// Base table read
export interface ScanNode {
	readonly type: 'scan';
	readonly table: string;
	readonly alias?: string;
}

// Named reference to another model in the graph
export interface RefNode {
	readonly type: 'ref';
	readonly model: string;
	readonly alias?: string;
}

// Reference to a common-table-expression bound by an enclosing cte node
export interface CteRefNode {
	readonly type: 'cteRef';
	readonly name: string;
	readonly alias?: string;
}

// Derived table: a nested query exposed under an alias
export interface SubqueryNode {
	readonly type: 'subquery';
	readonly query: Relation;
	readonly alias: string;
}

/**
 * One common-table-expression binding: `WITH name AS (definition) body`.
 * Several CTEs nest as a chain of cte nodes; later definitions see earlier names.
 */
export interface CteNode {
	readonly type: 'cte';
	readonly name: string;
	readonly definition: Relation;
	readonly body: Relation;
}

export interface FilterNode {
	readonly type: 'filter';
	readonly input: Relation;
	readonly predicate: Expression;
}

// Projection; output rows are addressed by column name only
export interface SelectNode {
	readonly type: 'select';
	readonly input: Relation;
	readonly columns: readonly NamedExpr[];
	readonly distinct: boolean;
}

// Grouped aggregation; outputs are the group keys followed by the aggregates
export interface AggregateNode {
	readonly type: 'aggregate';
	readonly input: Relation;
	readonly groupBy: readonly NamedExpr[];
	readonly aggregates: readonly NamedExpr[];
}

export type JoinKind = 'inner' | 'left' | 'cross';

export interface JoinNode {
	readonly type: 'join';
	readonly kind: JoinKind;
	readonly left: Relation;
	readonly right: Relation;
	readonly on?: Expression;
}

export interface SortNode {
	readonly type: 'sort';
	readonly input: Relation;
	readonly keys: readonly SortKey[];
}

export interface LimitNode {
	readonly type: 'limit';
	readonly input: Relation;
	readonly count: number;
	readonly offset: number;
}

/** Relations that expose a row source under an alias to their parent. */
export type SourceNode = ScanNode | RefNode | CteRefNode | SubqueryNode;

export function isSourceNode(node: Relation): node is SourceNode {
	return node.type === 'scan' || node.type === 'ref' || node.type === 'cteRef' || node.type === 'subquery';
}

/** The alias a source is addressed by when no explicit alias is given. */
export function effectiveAlias(node: SourceNode): string {
	switch (node.type) {
		case 'scan': return node.alias ?? node.table;
		case 'ref': return node.alias ?? node.model;
		case 'cteRef': return node.alias ?? node.name;
		case 'subquery': return node.alias;
	}
}

/** Output column names of relations whose outputs are explicitly named. */
export function outputNames(node: SelectNode | AggregateNode): string[] {
	return node.type === 'select'
		? node.columns.map(c => c.name)
		: [...node.groupBy.map(g => g.name), ...node.aggregates.map(a => a.name)];
}
