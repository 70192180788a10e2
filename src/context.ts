/**
 * Optimizer context passed to every rule
 * Carries tuning, backend capabilities, prefetched statistics and the diagnostics sink
 */

import { createLogger } from './common/logger.js';
import type { RecoverableError } from './common/errors.js';
import type { BackendCapabilities } from './cse/materialization-planner.js';
import type { OptimizerTuning } from './optimizer-tuning.js';
import type { RowEstimates } from './stats/catalog.js';

const log = createLogger('context');

export interface OptContext {
	readonly tuning: OptimizerTuning;
	readonly backend: BackendCapabilities;
	/** Row estimates per model, fetched before the pass; undefined means unknown */
	readonly stats: RowEstimates;
	/** Checked between rule applications */
	readonly signal?: AbortSignal;
	/** Recoverable errors recorded so far, in order */
	readonly diagnostics: readonly RecoverableError[];
	report(error: RecoverableError): void;
}

export class OptimizationContext implements OptContext {
	private readonly recorded: RecoverableError[] = [];
	private readonly seen = new Set<string>();

	constructor(
		public readonly tuning: OptimizerTuning,
		public readonly backend: BackendCapabilities,
		public readonly stats: RowEstimates,
		public readonly signal?: AbortSignal,
	) {
		log('Created optimization context (%d row estimate(s))', stats.size);
	}

	get diagnostics(): readonly RecoverableError[] {
		return this.recorded;
	}

	/**
	 * Record a recoverable error. Rules re-match on every iteration, so an identical
	 * error is recorded once.
	 */
	report(error: RecoverableError): void {
		const key = `${error.name}:${error.message}`;
		if (this.seen.has(key)) return;
		this.seen.add(key);
		this.recorded.push(error);
		log('Diagnostic: %s', error.message);
	}
}
