/**
 * Model graph: named models and the reference edges between them.
 *
 * Every mutation is staged on a copy of the model map, validated as a whole
 * (all references resolve, edges form a DAG) and only then committed, so no
 * partially-linked state is ever observable.
 */

import { collectReferences } from '../ast/traverse.js';
import type { Relation } from '../ast/nodes.js';
import { createLogger } from '../common/logger.js';
import { CyclicDependencyError, MisuseError, UnresolvedReferenceError } from '../common/errors.js';
import { isSharedModel, type Model, type ModelInput, type SharedComputationInfo } from './model.js';

const log = createLogger('graph');

export class ModelGraph {
	private models: Map<string, Model>;

	constructor(inputs: Iterable<ModelInput> = []) {
		this.models = new Map();
		const staged = [...inputs];
		if (staged.length > 0) {
			this.addModels(staged);
		}
	}

	/** Independent copy; models themselves are immutable and shared. */
	clone(): ModelGraph {
		const copy = new ModelGraph();
		copy.models = new Map(this.models);
		return copy;
	}

	get size(): number {
		return this.models.size;
	}

	hasModel(name: string): boolean {
		return this.models.has(name);
	}

	getModel(name: string): Model | undefined {
		return this.models.get(name);
	}

	requireModel(name: string): Model {
		const model = this.models.get(name);
		if (!model) {
			throw new MisuseError(`Unknown model '${name}'`);
		}
		return model;
	}

	/** All models, sorted by name. */
	allModels(): Model[] {
		return [...this.models.values()].sort((a, b) => compareNames(a.name, b.name));
	}

	/** Synthetic shared-computation models, in creation order. */
	sharedComputations(): Array<Model & { readonly shared: SharedComputationInfo }> {
		return this.allModels()
			.filter(isSharedModel)
			.sort((a, b) => a.shared.sequence - b.shared.sequence);
	}

	addModel(input: ModelInput): void {
		this.addModels([input]);
	}

	/**
	 * Add several models at once; they may reference each other in any order.
	 */
	addModels(inputs: readonly ModelInput[]): void {
		const staged = new Map(this.models);
		for (const input of inputs) {
			if (staged.has(input.name)) {
				throw new MisuseError(`Model '${input.name}' already exists`);
			}
			staged.set(input.name, modelFromInput(input));
		}
		this.commit(staged);
		log('Added %d model(s): %s', inputs.length, inputs.map(i => i.name).join(', '));
	}

	/**
	 * Caller edit: replaces the authored tree (and the current tree with it).
	 */
	updateModel(name: string, tree: Relation, references?: readonly string[]): void {
		const existing = this.requireModel(name);
		if (isSharedModel(existing)) {
			throw new MisuseError(`Shared computation '${name}' cannot be edited directly`);
		}
		const staged = new Map(this.models);
		staged.set(name, {
			...existing,
			sourceTree: tree,
			tree,
			declaredReferences: [...(references ?? existing.declaredReferences)].sort(),
		});
		this.commit(staged);
		log('Updated model %s', name);
	}

	/**
	 * Rewrite: replaces the current tree, leaving the authored tree untouched.
	 */
	replaceTree(name: string, tree: Relation): void {
		this.applyChanges([{ ...this.requireModel(name), tree }], []);
	}

	/**
	 * Insert or replace whole models and remove others in one validated step.
	 */
	applyChanges(upserts: readonly Model[], removals: readonly string[]): void {
		const staged = new Map(this.models);
		for (const name of removals) {
			if (!staged.delete(name)) {
				throw new MisuseError(`Unknown model '${name}'`);
			}
		}
		for (const model of upserts) {
			staged.set(model.name, model);
		}
		this.commit(staged);
	}

	removeModel(name: string): void {
		this.requireModel(name);
		const staged = new Map(this.models);
		staged.delete(name);
		this.commit(staged);
		log('Removed model %s', name);
	}

	/** Names of the models this model reads, sorted. */
	getProviders(name: string): string[] {
		return providersOf(this.requireModel(name));
	}

	/** Names of the models that read this model, sorted. */
	getConsumers(name: string): string[] {
		this.requireModel(name);
		return this.allModels()
			.filter(m => providersOf(m).includes(name))
			.map(m => m.name);
	}

	/**
	 * Providers before consumers; ties broken by name so the order is stable.
	 */
	topologicalOrder(): string[] {
		return topologicalSort(this.models);
	}

	private commit(staged: Map<string, Model>): void {
		validateEdges(staged);
		this.models = staged;
	}
}

function modelFromInput(input: ModelInput): Model {
	return {
		name: input.name,
		sourceTree: input.tree,
		tree: input.tree,
		declaredReferences: [...(input.references ?? [])].sort(),
		hint: input.hint ?? 'auto',
	};
}

export function providersOf(model: Model): string[] {
	const names = new Set([...collectReferences(model.tree), ...model.declaredReferences]);
	return [...names].sort();
}

function compareNames(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Throws UnresolvedReferenceError for the first dangling reference (by model name),
 * or CyclicDependencyError with the offending cycle.
 */
function validateEdges(models: ReadonlyMap<string, Model>): void {
	const names = [...models.keys()].sort();
	for (const name of names) {
		const model = models.get(name);
		if (!model) continue;
		for (const provider of providersOf(model)) {
			if (!models.has(provider)) {
				throw new UnresolvedReferenceError(name, provider);
			}
		}
	}
	const cycle = findCycle(models);
	if (cycle) {
		throw new CyclicDependencyError(cycle);
	}
}

/** Depth-first search for a cycle; returns the cycle path with the first node repeated at the end. */
export function findCycle(models: ReadonlyMap<string, Model>): string[] | undefined {
	const state = new Map<string, 'visiting' | 'visited'>();
	const stack: string[] = [];

	const visit = (name: string): string[] | undefined => {
		const current = state.get(name);
		if (current === 'visited') return undefined;
		if (current === 'visiting') {
			return [...stack.slice(stack.indexOf(name)), name];
		}
		state.set(name, 'visiting');
		stack.push(name);
		const model = models.get(name);
		for (const provider of model ? providersOf(model) : []) {
			if (!models.has(provider)) continue;
			const cycle = visit(provider);
			if (cycle) return cycle;
		}
		stack.pop();
		state.set(name, 'visited');
		return undefined;
	};

	for (const name of [...models.keys()].sort()) {
		const cycle = visit(name);
		if (cycle) return cycle;
	}
	return undefined;
}

function topologicalSort(models: ReadonlyMap<string, Model>): string[] {
	const remaining = new Map<string, Set<string>>();
	for (const [name, model] of models) {
		remaining.set(name, new Set(providersOf(model).filter(p => models.has(p))));
	}

	const order: string[] = [];
	while (remaining.size > 0) {
		const ready = [...remaining.entries()]
			.filter(([, providers]) => providers.size === 0)
			.map(([name]) => name)
			.sort();
		if (ready.length === 0) {
			// Unreachable for committed graphs; validateEdges rejects cycles
			throw new CyclicDependencyError(findCycle(models) ?? [...remaining.keys()]);
		}
		for (const name of ready) {
			order.push(name);
			remaining.delete(name);
			for (const providers of remaining.values()) {
				providers.delete(name);
			}
		}
	}
	return order;
}
