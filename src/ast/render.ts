/**
 * Render query trees back into SQL text.
 *
 * Formatting Notes:
 * - Emits lowercase SQL keywords.
 * - Quotes identifiers with double quotes only when they are not plain identifiers.
 * - Model references are emitted as `ref('name')`, the form the loader resolves.
 * - Nested binary expressions are fully parenthesized; no precedence table is consulted.
 */

import type { SqlValue } from '../common/types.js';
import type { Expression, NamedExpr, Relation } from './nodes.js';

const RESERVED = new Set([
	'select', 'from', 'where', 'group', 'by', 'order', 'limit', 'offset', 'join', 'on', 'as', 'and', 'or',
	'not', 'null', 'with', 'distinct', 'left', 'inner', 'cross', 'having', 'asc', 'desc', 'is', 'true', 'false',
]);

const isValidIdentifier = (name: string): boolean => /^[a-zA-Z_][a-zA-Z0-9_]*$/.test(name);

export function quoteIdentifier(name: string): string {
	if (RESERVED.has(name.toLowerCase()) || !isValidIdentifier(name)) {
		return `"${name.replace(/"/g, '""')}"`;
	}
	return name;
}

export function literalToString(value: SqlValue): string {
	if (value === null) return 'null';
	if (typeof value === 'boolean') return value ? 'true' : 'false';
	if (typeof value === 'number') return String(value);
	return `'${value.replace(/'/g, "''")}'`;
}

export function expressionToString(expr: Expression): string {
	switch (expr.type) {
		case 'column':
			return expr.qualifier === undefined
				? quoteIdentifier(expr.name)
				: `${quoteIdentifier(expr.qualifier)}.${quoteIdentifier(expr.name)}`;
		case 'literal':
			return literalToString(expr.value);
		case 'call': {
			if (expr.args.length === 0 && expr.name.toLowerCase() === 'count') {
				return 'count(*)';
			}
			const args = expr.args.map(expressionToString).join(', ');
			return `${expr.name}(${expr.distinct ? 'distinct ' : ''}${args})`;
		}
		case 'binary':
			return `${operandToString(expr.left)} ${expr.operator.toLowerCase()} ${operandToString(expr.right)}`;
		case 'unary':
			switch (expr.operator) {
				case 'NOT': return `not ${operandToString(expr.operand)}`;
				case '-': return `-${negatedToString(expr.operand)}`;
				case 'IS NULL': return `${operandToString(expr.operand)} is null`;
				case 'IS NOT NULL': return `${operandToString(expr.operand)} is not null`;
			}
	}
}

function operandToString(expr: Expression): string {
	const text = expressionToString(expr);
	return expr.type === 'binary' || expr.type === 'unary' ? `(${text})` : text;
}

/** `--` would open a line comment. */
function negatedToString(operand: Expression): string {
	const text = operandToString(operand);
	return text.startsWith('-') ? `(${text})` : text;
}

function namedToString(named: NamedExpr): string {
	const text = expressionToString(named.expr);
	if (named.expr.type === 'column' && named.expr.name === named.name) {
		return text;
	}
	return `${text} as ${quoteIdentifier(named.name)}`;
}

function aliasSuffix(alias: string | undefined): string {
	return alias === undefined ? '' : ` as ${quoteIdentifier(alias)}`;
}

/** FROM-clause text for a relation; anything that is not a row source is wrapped. */
function fromToString(rel: Relation): string {
	switch (rel.type) {
		case 'scan':
			return `${quoteIdentifier(rel.table)}${aliasSuffix(rel.alias)}`;
		case 'ref':
			return `ref('${rel.model.replace(/'/g, "''")}')${aliasSuffix(rel.alias)}`;
		case 'cteRef':
			return `${quoteIdentifier(rel.name)}${aliasSuffix(rel.alias)}`;
		case 'subquery':
			return `(${relationToString(rel.query)}) as ${quoteIdentifier(rel.alias)}`;
		case 'join': {
			const left = fromToString(rel.left);
			const right = fromToString(rel.right);
			if (rel.kind === 'cross') {
				return `${left} cross join ${right}`;
			}
			const on = rel.on ? ` on ${expressionToString(rel.on)}` : '';
			return `${left} ${rel.kind} join ${right}${on}`;
		}
		default:
			return `(${relationToString(rel)}) as _sub`;
	}
}

/** FROM plus optional WHERE for the input of a select or aggregate. */
function inputToString(input: Relation): string {
	if (input.type === 'filter') {
		return `${fromToString(input.input)} where ${expressionToString(input.predicate)}`;
	}
	return fromToString(input);
}

/**
 * Render a relation as a complete query.
 */
export function relationToString(rel: Relation): string {
	switch (rel.type) {
		case 'scan':
		case 'ref':
		case 'cteRef':
		case 'subquery':
		case 'join':
			return `select * from ${fromToString(rel)}`;
		case 'cte': {
			const bindings: string[] = [];
			let current: Relation = rel;
			while (current.type === 'cte') {
				bindings.push(`${quoteIdentifier(current.name)} as (${relationToString(current.definition)})`);
				current = current.body;
			}
			return `with ${bindings.join(', ')} ${relationToString(current)}`;
		}
		case 'filter':
			return `select * from ${fromToString(rel.input)} where ${expressionToString(rel.predicate)}`;
		case 'select': {
			const columns = rel.columns.map(namedToString).join(', ');
			return `select ${rel.distinct ? 'distinct ' : ''}${columns} from ${inputToString(rel.input)}`;
		}
		case 'aggregate': {
			const columns = [...rel.groupBy, ...rel.aggregates].map(namedToString).join(', ');
			const groupBy = rel.groupBy.length > 0
				? ` group by ${rel.groupBy.map(g => expressionToString(g.expr)).join(', ')}`
				: '';
			return `select ${columns} from ${inputToString(rel.input)}${groupBy}`;
		}
		case 'sort': {
			const keys = rel.keys.map(k => `${expressionToString(k.expr)}${k.direction === 'desc' ? ' desc' : ''}`).join(', ');
			const base = rel.input.type === 'sort' || rel.input.type === 'limit'
				? `select * from ${fromToString(rel.input)}`
				: relationToString(rel.input);
			return `${base} order by ${keys}`;
		}
		case 'limit': {
			const base = rel.input.type === 'limit'
				? `select * from ${fromToString(rel.input)}`
				: relationToString(rel.input);
			return `${base} limit ${rel.count}${rel.offset > 0 ? ` offset ${rel.offset}` : ''}`;
		}
	}
}

/** Render any tree (relation) as SQL text. */
export function renderSql(tree: Relation): string {
	return relationToString(tree);
}
