import { StatusCode } from './types.js';

/**
 * Base class for optimizer errors.
 * Carries a status code and an optional underlying cause.
 */
export class OptimizerError extends Error {
	public code: number;
	public cause?: Error;

	constructor(message: string, code: number = StatusCode.ERROR, cause?: Error) {
		super(message);
		this.code = code;
		this.name = 'OptimizerError';
		this.cause = cause;

		// Maintain stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, OptimizerError);
		}
	}
}

/**
 * Reference edges would form a cycle. Fatal: the whole graph is rejected.
 */
export class CyclicDependencyError extends OptimizerError {
	constructor(public readonly cycle: readonly string[]) {
		super(`Cyclic model dependency: ${cycle.join(' -> ')}`, StatusCode.CONSTRAINT);
		this.name = 'CyclicDependencyError';
		Object.setPrototypeOf(this, CyclicDependencyError.prototype);
	}
}

/**
 * A model references a name that no model in the graph carries. Fatal.
 */
export class UnresolvedReferenceError extends OptimizerError {
	constructor(public readonly model: string, public readonly reference: string) {
		super(`Model '${model}' references undefined model '${reference}'`, StatusCode.NOTFOUND);
		this.name = 'UnresolvedReferenceError';
		Object.setPrototypeOf(this, UnresolvedReferenceError.prototype);
	}
}

/**
 * Two consumers need the same output column with different definitions.
 * Recoverable: only the affected candidate is dropped.
 */
export class AmbiguousSchemaError extends OptimizerError {
	constructor(
		public readonly column: string,
		public readonly fingerprint: string,
		public readonly definitions: readonly string[],
	) {
		super(`Column '${column}' has conflicting definitions across consumers of ${fingerprint}: ${definitions.join(' vs ')}`, StatusCode.SCHEMA);
		this.name = 'AmbiguousSchemaError';
		Object.setPrototypeOf(this, AmbiguousSchemaError.prototype);
	}
}

/**
 * The rule engine ran out of iterations before reaching a fixpoint.
 * Recoverable: the last graph reached is returned.
 */
export class RuleNonterminatingError extends OptimizerError {
	constructor(public readonly iterations: number, public readonly lastRule?: string) {
		super(`Rule application did not reach a fixpoint within ${iterations} iterations${lastRule ? ` (last rule: ${lastRule})` : ''}`, StatusCode.ABORT);
		this.name = 'RuleNonterminatingError';
		Object.setPrototypeOf(this, RuleNonterminatingError.prototype);
	}
}

/**
 * A consumer's boundary no longer matches its shared computation.
 * Recoverable: that consumer's participation is dissolved.
 */
export class DivergentMaterializationError extends OptimizerError {
	constructor(public readonly model: string, public readonly shared: string) {
		super(`Model '${model}' no longer matches shared computation '${shared}'`, StatusCode.MISMATCH);
		this.name = 'DivergentMaterializationError';
		Object.setPrototypeOf(this, DivergentMaterializationError.prototype);
	}
}

/**
 * Error thrown when the API is used incorrectly
 */
export class MisuseError extends OptimizerError {
	constructor(message: string = 'API misuse') {
		super(message, StatusCode.MISUSE);
		this.name = 'MisuseError';
		Object.setPrototypeOf(this, MisuseError.prototype);
	}
}

/**
 * Errors that never abort a pass; they are collected as diagnostics instead.
 */
export type RecoverableError = AmbiguousSchemaError | RuleNonterminatingError | DivergentMaterializationError;

export function isRecoverable(error: unknown): error is RecoverableError {
	return error instanceof AmbiguousSchemaError
		|| error instanceof RuleNonterminatingError
		|| error instanceof DivergentMaterializationError;
}

/**
 * Helper function to throw an OptimizerError
 * @returns Never (always throws)
 */
export function optimizerError(message: string, code: StatusCode = StatusCode.ERROR, cause?: Error): never {
	throw new OptimizerError(message, code, cause);
}

/**
 * Render an error and its chain of causes, one per line.
 */
export function formatErrorChain(error: unknown): string {
	const lines: string[] = [];
	let current: unknown = error;
	let depth = 0;
	while (current instanceof Error && depth < 16) {
		lines.push(`${'  '.repeat(depth)}${current.name}: ${current.message}`);
		current = current.cause;
		depth++;
	}
	if (lines.length === 0) {
		lines.push(String(error));
	}
	return lines.join('\n');
}
