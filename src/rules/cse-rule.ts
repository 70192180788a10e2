/**
 * Built-in rule: extract common subexpressions shared by several models into one
 * synthetic shared-computation model.
 */

import { AmbiguousSchemaError, MisuseError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import type { OptContext } from '../context.js';
import type { BoundaryOccurrence } from '../cse/boundary.js';
import { detectCandidates, subsumes, type CseCandidate } from '../cse/detector.js';
import { MaterializationPlanner, type MaterializationPlan } from '../cse/materialization-planner.js';
import { extractSharedComputation } from '../cse/rewrite.js';
import { unifySchema, type UnifiedSchema } from '../cse/schema-unifier.js';
import type { ModelGraph } from '../graph/model-graph.js';
import type { OptimizationRule } from './registry.js';

const log = createLogger('rules:cse');

export const CSE_RULE_ID = 'cross-model-cse';

export interface CseMatch {
	readonly candidate: CseCandidate;
	/** Occurrences in participating consumers (hint `never` excluded) */
	readonly occurrences: readonly BoundaryOccurrence[];
	readonly consumers: readonly string[];
	readonly unified: UnifiedSchema;
	readonly plan: MaterializationPlan;
}

export function createCseRule(): OptimizationRule<CseMatch> {
	return {
		id: CSE_RULE_ID,
		priority: 10,

		match(graph: ModelGraph, context: OptContext): CseMatch[] {
			const planner = new MaterializationPlanner(context.backend, context.tuning);
			const matches: CseMatch[] = [];

			for (const candidate of detectCandidates(graph, { keepNested: true })) {
				const occurrences = candidate.occurrences.filter(o => graph.requireModel(o.model).hint !== 'never');
				const consumers = [...new Set(occurrences.map(o => o.model))].sort();

				let unified: UnifiedSchema;
				try {
					unified = unifySchema(candidate.fingerprint.key, occurrences, model => graph.requireModel(model).tree);
				} catch (error) {
					if (!(error instanceof AmbiguousSchemaError)) throw error;
					context.report(error);
					continue;
				}

				const plan = planner.plan({
					consumerCount: consumers.length,
					persistenceRequested: consumers.some(c => graph.requireModel(c).hint === 'always'),
					volume: planner.classifyVolume(consumers, context.stats),
				});
				if (!plan.materialize) {
					log('Candidate %s not materialized: %s', candidate.fingerprint.key, plan.reason);
				}
				matches.push({ candidate, occurrences, consumers, unified, plan });
			}
			return outermost(matches);
		},

		isApplicable(match: CseMatch): boolean {
			return match.plan.materialize;
		},

		apply(match: CseMatch, graph: ModelGraph, context: OptContext): ModelGraph {
			if (!match.plan.materialize) {
				throw new MisuseError(`Candidate ${match.candidate.fingerprint.key} was not planned for materialization`);
			}
			const [first] = match.occurrences;
			return extractSharedComputation(graph, {
				fingerprint: match.candidate.fingerprint,
				core: first.core,
				occurrences: match.occurrences,
				schema: match.unified.schema,
				requirements: match.unified.requirements,
				strategy: match.plan.strategy,
			}, context.tuning.sharedModelPrefix).graph;
		},

		describe(match: CseMatch): string {
			return `${match.candidate.fingerprint.hash.slice(0, 8)} shared by ${match.consumers.join(', ')}`;
		},
	};
}

/**
 * Drop matches nested inside another match for the same consumers. Only a container
 * that unified, and is materialized wherever the nested match is, can displace it; a
 * rejected container leaves the boundaries beneath it in play.
 */
function outermost(matches: readonly CseMatch[]): CseMatch[] {
	const kept = matches.filter(inner => !matches.some(outer =>
		(outer.plan.materialize || !inner.plan.materialize) && subsumes(outer, inner)));
	if (kept.length < matches.length) {
		log('Dropped %d nested candidate(s)', matches.length - kept.length);
	}
	return kept;
}
