/**
 * Result codes carried by optimizer errors.
 * Numbering follows the SQLite-style codes used across the wider toolchain.
 */
export enum StatusCode {
	OK = 0,
	ERROR = 1,
	INTERNAL = 2,
	ABORT = 4,
	NOTFOUND = 12,
	SCHEMA = 17,
	CONSTRAINT = 19,
	MISMATCH = 20,
	MISUSE = 21,
	WARNING = 28,
	UNSUPPORTED = 30,
}

/** Literal values that may appear in a query tree. */
export type SqlValue = string | number | boolean | null;

/** A result row keyed by output column name. */
export type Row = Record<string, SqlValue>;

export type MaybePromise<T> = T | Promise<T>;
