/**
 * Materialization planner
 * Decides whether and how a shared computation is materialized, from consumer count,
 * consumer hints, backend capabilities and row-volume estimates
 */

import { createLogger } from '../common/logger.js';
import type { SharedComputationInfo } from '../graph/model.js';
import type { OptimizerTuning } from '../optimizer-tuning.js';

const log = createLogger('cse:materialization');

export type MaterializationStrategy = 'inline-cte' | 'temp-table' | 'view';

/**
 * What the execution backend can do with a shared computation
 */
export interface BackendCapabilities {
	/** The backend evaluates a common table expression once per statement */
	readonly cachesCommonTableExpressions: boolean;
	readonly supportsTempTables: boolean;
	readonly supportsViews: boolean;
}

export const DEFAULT_BACKEND: BackendCapabilities = Object.freeze({
	cachesCommonTableExpressions: false,
	supportsTempTables: true,
	supportsViews: true,
});

export type VolumeClass = 'small' | 'large' | 'unknown';

export interface PlanRequest {
	readonly consumerCount: number;
	/** Some consumer asked for persistent results (hint `always`) */
	readonly persistenceRequested: boolean;
	readonly volume: VolumeClass;
}

/**
 * Planner outcome
 */
export type MaterializationPlan =
	| { readonly materialize: true; readonly strategy: MaterializationStrategy; readonly reason: string }
	| { readonly materialize: false; readonly reason: string };

export class MaterializationPlanner {
	constructor(
		private readonly backend: BackendCapabilities,
		private readonly tuning: OptimizerTuning,
	) { }

	plan(request: PlanRequest): MaterializationPlan {
		const decision = this.decide(request);
		log('Plan for %d consumer(s), volume %s: %s (%s)',
			request.consumerCount, request.volume, decision.materialize ? decision.strategy : 'reject', decision.reason);
		return decision;
	}

	/**
	 * Largest row estimate among the consumers; unknown when any estimate is missing.
	 */
	classifyVolume(consumers: readonly string[], estimates: ReadonlyMap<string, number | undefined>): VolumeClass {
		let largest = 0;
		for (const consumer of consumers) {
			const rows = estimates.get(consumer);
			if (rows === undefined) return 'unknown';
			largest = Math.max(largest, rows);
		}
		return largest <= this.tuning.materialization.smallVolumeRows ? 'small' : 'large';
	}

	private decide(request: PlanRequest): MaterializationPlan {
		// Rule 1: sharing needs at least two consumers
		if (request.consumerCount < 2) {
			return { materialize: false, reason: `Only ${request.consumerCount} consumer(s)` };
		}

		// Rule 2: requested persistence goes to a view when the backend has them
		if (request.persistenceRequested && this.backend.supportsViews) {
			return { materialize: true, strategy: 'view', reason: 'Persistence requested by a consumer' };
		}

		// Rule 3: small results stay inline when the backend computes a CTE once
		if (this.backend.cachesCommonTableExpressions && request.volume === 'small') {
			return { materialize: true, strategy: 'inline-cte', reason: 'Small result and backend caches CTEs' };
		}

		// Rule 4: otherwise a temp table, computed once per run
		if (this.backend.supportsTempTables) {
			const why = this.backend.cachesCommonTableExpressions
				? `${request.volume} result volume`
				: 'Backend does not cache CTEs';
			return { materialize: true, strategy: 'temp-table', reason: why };
		}

		// Fallbacks for backends without temp tables
		if (this.backend.cachesCommonTableExpressions) {
			return { materialize: true, strategy: 'inline-cte', reason: 'Temp tables unsupported; cached CTE fallback' };
		}
		if (this.backend.supportsViews) {
			return { materialize: true, strategy: 'view', reason: 'Temp tables unsupported; view fallback' };
		}

		return { materialize: false, reason: 'Backend has no way to materialize' };
	}
}

/**
 * Apply a fresh recommendation to an active shared computation. With hysteresis the
 * switch happens only when the previous pass recommended the same new strategy.
 */
export function nextStrategy(
	info: SharedComputationInfo,
	recommended: MaterializationStrategy,
	hysteresis: boolean,
): SharedComputationInfo {
	if (recommended === info.strategy) {
		return info.pendingStrategy === undefined ? info : { ...info, pendingStrategy: undefined };
	}
	if (!hysteresis || info.pendingStrategy === recommended) {
		log('Switching strategy %s -> %s', info.strategy, recommended);
		return { ...info, strategy: recommended, pendingStrategy: undefined };
	}
	return { ...info, pendingStrategy: recommended };
}
