import { createLogger } from './common/logger.js';
import { OptimizationContext, type OptContext } from './context.js';
import {
	DEFAULT_BACKEND, MaterializationPlanner, nextStrategy, type BackendCapabilities,
} from './cse/materialization-planner.js';
import { isSharedModel, type Model } from './graph/model.js';
import type { ModelGraph } from './graph/model-graph.js';
import { resolveTuning, type OptimizerTuning, type TuningOverrides } from './optimizer-tuning.js';
import { createCseRule } from './rules/cse-rule.js';
import { RuleRegistry, type OptimizationRule } from './rules/registry.js';
import { RuleEngine, type OptimizationResult } from './rules/rule-engine.js';
import { prefetchRowEstimates, type CatalogStats } from './stats/catalog.js';

const log = createLogger('optimizer');

export interface OptimizerOptions {
	readonly tuning?: TuningOverrides;
	readonly backend?: Partial<BackendCapabilities>;
	readonly catalog?: CatalogStats;
	/** Extra rules, registered after the built-in ones */
	readonly rules?: readonly OptimizationRule[];
}

export interface OptimizeOptions {
	readonly signal?: AbortSignal;
}

/**
 * Rewrites a model graph so computations shared by several models run once
 */
export class Optimizer {
	readonly tuning: OptimizerTuning;
	readonly backend: BackendCapabilities;
	readonly registry = new RuleRegistry();
	private readonly engine: RuleEngine;
	private readonly catalog?: CatalogStats;

	constructor(options: OptimizerOptions = {}) {
		this.tuning = resolveTuning(options.tuning);
		this.backend = { ...DEFAULT_BACKEND, ...options.backend };
		this.catalog = options.catalog;
		this.engine = new RuleEngine(this.registry);

		this.registry.register(createCseRule());
		for (const rule of options.rules ?? []) {
			this.registry.register(rule);
		}
	}

	registerRule<TMatch>(rule: OptimizationRule<TMatch>): void {
		this.registry.register(rule);
	}

	/**
	 * Context for one pass, with row estimates fetched for every authored model
	 */
	async createContext(graph: ModelGraph, signal?: AbortSignal): Promise<OptimizationContext> {
		const names = graph.allModels().filter(m => !isSharedModel(m)).map(m => m.name);
		const stats = await prefetchRowEstimates(this.catalog, names, this.tuning.statsTimeoutMs);
		return new OptimizationContext(this.tuning, this.backend, stats, signal);
	}

	/**
	 * One full pass. The input graph is not modified; the result carries the new one.
	 */
	async optimize(graph: ModelGraph, options: OptimizeOptions = {}): Promise<OptimizationResult> {
		const context = await this.createContext(graph, options.signal);
		return this.run(graph, context);
	}

	/** Synchronous pass over an already prepared context. */
	run(graph: ModelGraph, context: OptContext): OptimizationResult {
		log('Optimizing %d model(s)', graph.size);
		return this.engine.run(this.replan(graph, context), context);
	}

	/**
	 * Re-plan every active shared computation against current statistics.
	 */
	private replan(graph: ModelGraph, context: OptContext): ModelGraph {
		const planner = new MaterializationPlanner(context.backend, context.tuning);
		const upserts: Model[] = [];

		for (const model of graph.sharedComputations()) {
			const info = model.shared;
			if (info.state !== 'active') continue;
			const plan = planner.plan({
				consumerCount: info.consumers.length,
				persistenceRequested: info.consumers.some(c => graph.getModel(c)?.hint === 'always'),
				volume: planner.classifyVolume(info.consumers, context.stats),
			});
			if (!plan.materialize) continue;
			const next = nextStrategy(info, plan.strategy, context.tuning.materialization.hysteresis);
			if (next !== info) {
				upserts.push({ ...model, shared: next });
			}
		}

		if (upserts.length === 0) return graph;
		const replanned = graph.clone();
		replanned.applyChanges(upserts, []);
		return replanned;
	}
}
