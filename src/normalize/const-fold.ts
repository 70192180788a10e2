/**
 * Constant folding for scalar expressions.
 *
 * Folds bottom-up. Boolean identities are applied only where they hold under
 * three-valued logic (x AND false = false, x OR true = true, x AND true = x,
 * x OR false = x). Division or modulo by zero and mixed-type comparisons are
 * left unfolded.
 */

import { binary, call, callDistinct, lit, unary } from '../ast/build.js';
import type { BinaryExpr, CallExpr, Expression, LiteralExpr, UnaryExpr } from '../ast/nodes.js';
import type { SqlValue } from '../common/types.js';
import { createLogger } from '../common/logger.js';

const log = createLogger('normalize:folding');

const FOLDABLE_FUNCTIONS = new Map<string, (value: SqlValue) => SqlValue | undefined>([
	['abs', v => (typeof v === 'number' ? Math.abs(v) : undefined)],
	['lower', v => (typeof v === 'string' ? v.toLowerCase() : undefined)],
	['upper', v => (typeof v === 'string' ? v.toUpperCase() : undefined)],
]);

export function foldConstants(expr: Expression): Expression {
	switch (expr.type) {
		case 'column':
		case 'literal':
			return expr;
		case 'unary':
			return foldUnary(expr);
		case 'binary':
			return foldBinary(expr);
		case 'call':
			return foldCall(expr);
	}
}

function isLiteral(expr: Expression): expr is LiteralExpr {
	return expr.type === 'literal';
}

function foldUnary(expr: UnaryExpr): Expression {
	const operand = foldConstants(expr.operand);
	if (!isLiteral(operand)) {
		if (expr.operator === 'NOT' && operand.type === 'unary' && operand.operator === 'NOT') {
			return operand.operand;
		}
		return operand === expr.operand ? expr : unary(expr.operator, operand);
	}
	const v = operand.value;
	switch (expr.operator) {
		case 'IS NULL':
			return lit(v === null);
		case 'IS NOT NULL':
			return lit(v !== null);
		case 'NOT':
			if (v === null) return lit(null);
			if (typeof v === 'boolean') return lit(!v);
			break;
		case '-':
			if (v === null) return lit(null);
			if (typeof v === 'number') return lit(-v);
			break;
	}
	return operand === expr.operand ? expr : unary(expr.operator, operand);
}

function foldBinary(expr: BinaryExpr): Expression {
	const left = foldConstants(expr.left);
	const right = foldConstants(expr.right);
	const rebuilt = (): Expression =>
		left === expr.left && right === expr.right ? expr : binary(expr.operator, left, right);

	if (expr.operator === 'AND') {
		if (isBool(left, false) || isBool(right, false)) return lit(false);
		if (isBool(left, true)) return right;
		if (isBool(right, true)) return left;
		if (isNullLiteral(left) && isNullLiteral(right)) return lit(null);
		return rebuilt();
	}
	if (expr.operator === 'OR') {
		if (isBool(left, true) || isBool(right, true)) return lit(true);
		if (isBool(left, false)) return right;
		if (isBool(right, false)) return left;
		if (isNullLiteral(left) && isNullLiteral(right)) return lit(null);
		return rebuilt();
	}

	if (!isLiteral(left) || !isLiteral(right)) {
		return rebuilt();
	}

	const folded = evaluateBinary(expr.operator, left.value, right.value);
	if (folded === undefined) {
		return rebuilt();
	}
	log('Folded %s %s %s -> %o', left.value, expr.operator, right.value, folded);
	return lit(folded);
}

function evaluateBinary(operator: BinaryExpr['operator'], a: SqlValue, b: SqlValue): SqlValue | undefined {
	if (a === null || b === null) {
		return null;
	}
	if (operator === '||') {
		if (typeof a === 'boolean' || typeof b === 'boolean') return undefined;
		return `${a}${b}`;
	}
	if (typeof a === 'number' && typeof b === 'number') {
		switch (operator) {
			case '+': return a + b;
			case '-': return a - b;
			case '*': return a * b;
			// Integer operands divide as integers on some backends and as reals on others
			case '/': return b === 0 || (Number.isInteger(a) && Number.isInteger(b) && !Number.isInteger(a / b)) ? undefined : a / b;
			case '%': return b === 0 || !Number.isInteger(a) || !Number.isInteger(b) ? undefined : a % b;
		}
	}
	const order = compareLiterals(a, b);
	if (order === undefined) return undefined;
	switch (operator) {
		case '=': return order === 0;
		case '<>': return order !== 0;
		case '<': return order < 0;
		case '<=': return order <= 0;
		case '>': return order > 0;
		case '>=': return order >= 0;
		default: return undefined;
	}
}

/** Ordering of two non-null literals of the same type; undefined for mixed types. */
function compareLiterals(a: string | number | boolean, b: string | number | boolean): number | undefined {
	if (typeof a === 'number' && typeof b === 'number') return a - b;
	if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
	if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
	return undefined;
}

function foldCall(expr: CallExpr): Expression {
	const args = expr.args.map(foldConstants);
	const changed = args.some((a, i) => a !== expr.args[i]);
	const fn = FOLDABLE_FUNCTIONS.get(expr.name.toLowerCase());
	if (fn && args.length === 1 && !expr.distinct) {
		const [arg] = args;
		if (isLiteral(arg)) {
			if (arg.value === null) return lit(null);
			const value = fn(arg.value);
			if (value !== undefined) return lit(value);
		}
	}
	if (!changed) return expr;
	return expr.distinct ? callDistinct(expr.name, ...args) : call(expr.name, ...args);
}

function isBool(expr: Expression, value: boolean): boolean {
	return expr.type === 'literal' && expr.value === value;
}

function isNullLiteral(expr: Expression): boolean {
	return expr.type === 'literal' && expr.value === null;
}
