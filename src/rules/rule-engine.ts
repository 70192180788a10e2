/**
 * Fixpoint driver for graph rules.
 *
 * Each iteration walks the rule table in order, takes the first applicable match of
 * the first rule that has one, and applies it. The loop ends when nothing applies, when
 * the iteration budget runs out, or when the context's signal is aborted; in every case
 * the graph returned is the last one a rule produced.
 */

import { createLogger } from '../common/logger.js';
import { isRecoverable, RuleNonterminatingError, type RecoverableError } from '../common/errors.js';
import type { OptContext } from '../context.js';
import type { ModelGraph } from '../graph/model-graph.js';
import type { OptimizationRule, RuleRegistry } from './registry.js';

const log = createLogger('rules:engine');

export interface AppliedRule {
	readonly ruleId: string;
	readonly iteration: number;
	readonly description: string;
}

export interface OptimizationResult {
	readonly graph: ModelGraph;
	readonly applied: readonly AppliedRule[];
	readonly iterations: number;
	readonly reachedFixpoint: boolean;
	readonly aborted: boolean;
	readonly diagnostics: readonly RecoverableError[];
}

interface Step {
	readonly rule: OptimizationRule;
	readonly graph: ModelGraph;
	readonly description: string;
}

export class RuleEngine {
	constructor(private readonly registry: RuleRegistry) { }

	run(graph: ModelGraph, context: OptContext): OptimizationResult {
		const applied: AppliedRule[] = [];
		let current = graph;
		let reachedFixpoint = false;
		let aborted = false;

		for (;;) {
			if (context.signal?.aborted) {
				log('Aborted after %d application(s)', applied.length);
				aborted = true;
				break;
			}

			const step = this.nextStep(current, context);
			if (!step) {
				reachedFixpoint = true;
				break;
			}

			if (applied.length >= context.tuning.maxIterations) {
				context.report(new RuleNonterminatingError(applied.length, step.rule.id));
				break;
			}

			current = step.graph;
			applied.push({ ruleId: step.rule.id, iteration: applied.length + 1, description: step.description });
			log('Iteration %d: %s %s', applied.length, step.rule.id, step.description);
		}

		log('Finished: %d application(s), fixpoint=%s', applied.length, reachedFixpoint);
		return {
			graph: current,
			applied,
			iterations: applied.length,
			reachedFixpoint,
			aborted,
			diagnostics: [...context.diagnostics],
		};
	}

	private nextStep(graph: ModelGraph, context: OptContext): Step | undefined {
		for (const rule of this.registry.rules()) {
			let matches: readonly unknown[];
			try {
				matches = rule.match(graph, context);
			} catch (error) {
				this.recover(rule, error, context);
				continue;
			}

			for (const match of matches) {
				if (!rule.isApplicable(match, graph, context)) continue;
				try {
					const next = rule.apply(match, graph, context);
					return { rule, graph: next, description: rule.describe?.(match) ?? '' };
				} catch (error) {
					this.recover(rule, error, context);
				}
			}
		}
		return undefined;
	}

	/** Record recoverable errors; anything else propagates. */
	private recover(rule: OptimizationRule, error: unknown, context: OptContext): void {
		if (!isRecoverable(error)) {
			throw error;
		}
		log('Rule %s: %s', rule.id, error.message);
		context.report(error);
	}
}
