/**
 * Owns a model graph across edits and keeps its shared computations consistent.
 *
 * Every operation works on a staged copy: the edit itself, reconciliation of the
 * affected models and a fresh optimizer pass. The copy replaces the owned graph only
 * when all of it succeeds.
 */

import type { Relation } from '../ast/nodes.js';
import { collectReferences } from '../ast/traverse.js';
import { UnresolvedReferenceError, type RecoverableError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { isSharedModel, type ModelInput } from '../graph/model.js';
import type { ModelGraph } from '../graph/model-graph.js';
import { Optimizer, type OptimizeOptions } from '../optimizer.js';
import type { OptimizationResult } from '../rules/rule-engine.js';
import type { StateTransition } from './lifecycle.js';
import { Reconciler } from './reconciler.js';

const log = createLogger('tracker');

export interface TrackerReport {
	readonly transitions: readonly StateTransition[];
	readonly diagnostics: readonly RecoverableError[];
	readonly optimization: OptimizationResult;
}

export class DependencyTracker {
	private current: ModelGraph;
	private tail: Promise<unknown> = Promise.resolve();

	constructor(graph: ModelGraph, private readonly optimizer: Optimizer = new Optimizer()) {
		this.current = graph.clone();
	}

	/**
	 * Snapshot of the tracked graph. Edits made to it are not seen by the tracker;
	 * go through `addModel`, `updateModel` and `removeModel` instead.
	 */
	get graph(): ModelGraph {
		return this.current.clone();
	}

	optimize(options: OptimizeOptions = {}): Promise<TrackerReport> {
		return this.stage(options, () => undefined);
	}

	addModel(input: ModelInput, options: OptimizeOptions = {}): Promise<TrackerReport> {
		return this.stage(options, (staged, reconciler) => {
			staged.addModel(input);
			reconciler.reconcile([input.name]);
		});
	}

	updateModel(name: string, tree: Relation, references?: readonly string[], options: OptimizeOptions = {}): Promise<TrackerReport> {
		return this.stage(options, (staged, reconciler) => {
			staged.updateModel(name, tree, references);
			reconciler.reconcile([name]);
		});
	}

	/**
	 * @throws UnresolvedReferenceError while an authored model still reads `name`
	 */
	removeModel(name: string, options: OptimizeOptions = {}): Promise<TrackerReport> {
		return this.stage(options, (staged, reconciler) => {
			for (const model of staged.allModels()) {
				if (isSharedModel(model) || model.name === name) continue;
				if (collectReferences(model.sourceTree).includes(name) || model.declaredReferences.includes(name)) {
					throw new UnresolvedReferenceError(model.name, name);
				}
			}
			staged.removeModel(name);
			reconciler.detach(name, `${name} removed`);
			reconciler.reconcile([]);
		});
	}

	/** Operations run one at a time, in call order. */
	private stage(options: OptimizeOptions, mutate: (staged: ModelGraph, reconciler: Reconciler) => void): Promise<TrackerReport> {
		const run = this.tail.then(() => this.execute(options, mutate));
		// A failed operation must not block the ones queued behind it; its caller sees the rejection
		this.tail = run.then(() => undefined, () => undefined);
		return run;
	}

	private async execute(options: OptimizeOptions, mutate: (staged: ModelGraph, reconciler: Reconciler) => void): Promise<TrackerReport> {
		const staged = this.current.clone();
		const reconciler = new Reconciler(staged);
		mutate(staged, reconciler);

		const context = await this.optimizer.createContext(staged, options.signal);
		for (const diagnostic of reconciler.diagnostics) {
			context.report(diagnostic);
		}

		const before = new Set(staged.sharedComputations().map(m => m.name));
		const optimization = this.optimizer.run(staged, context);
		const created: StateTransition[] = optimization.graph.sharedComputations()
			.filter(m => !before.has(m.name))
			.map(m => ({ shared: m.name, from: 'candidate', to: 'active', reason: `extracted for ${m.shared.consumers.join(', ')}` }));

		this.current = optimization.graph;
		log('Committed: %d transition(s), %d diagnostic(s)', reconciler.transitions.length + created.length, context.diagnostics.length);
		return {
			transitions: [...reconciler.transitions, ...created],
			diagnostics: [...context.diagnostics],
			optimization,
		};
	}
}
