/**
 * Rule registration for the graph rule engine
 * Keeps an ordered, deterministic table of optimization rules
 */

import { createLogger } from '../common/logger.js';
import { optimizerError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';
import type { OptContext } from '../context.js';
import type { ModelGraph } from '../graph/model-graph.js';

const log = createLogger('rules:registry');

/**
 * A graph rewrite rule. All three operations read the graph snapshot they are given
 * and never mutate it; `apply` returns a new graph.
 */
export interface OptimizationRule<TMatch = unknown> {
	/** Unique identifier for this rule */
	readonly id: string;
	/** Optional priority (lower numbers run first) */
	readonly priority?: number;
	/** Candidate matches, in the order they should be tried */
	match(graph: ModelGraph, context: OptContext): readonly TMatch[];
	isApplicable(match: TMatch, graph: ModelGraph, context: OptContext): boolean;
	apply(match: TMatch, graph: ModelGraph, context: OptContext): ModelGraph;
	/** One-line description of a match for results and logs */
	describe?(match: TMatch): string;
}

export const DEFAULT_PRIORITY = 100;

export class RuleRegistry {
	private table: OptimizationRule[] = [];

	/**
	 * Register a rule, keeping priority order (ties keep registration order)
	 */
	register<TMatch>(rule: OptimizationRule<TMatch>): void {
		if (this.has(rule.id)) {
			optimizerError(`Optimization rule '${rule.id}' already registered`, StatusCode.MISUSE);
		}

		const priority = rule.priority ?? DEFAULT_PRIORITY;
		const insertIndex = this.table.findIndex(r => (r.priority ?? DEFAULT_PRIORITY) > priority);
		if (insertIndex === -1) {
			this.table.push(rule);
		} else {
			this.table.splice(insertIndex, 0, rule);
		}

		log('Registered rule %s (priority: %d)', rule.id, priority);
	}

	unregister(id: string): boolean {
		const before = this.table.length;
		this.table = this.table.filter(r => r.id !== id);
		return this.table.length !== before;
	}

	has(id: string): boolean {
		return this.table.some(r => r.id === id);
	}

	/** Rules in execution order */
	rules(): readonly OptimizationRule[] {
		return [...this.table];
	}
}
