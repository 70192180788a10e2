/**
 * Incremental maintenance of shared computations after model edits.
 *
 * A model's current tree is rebuilt from its authored tree by replaying the live
 * shared computations in creation order. Each replay either re-points the consumer,
 * grows the shared schema, lets a new model join, or detaches a consumer whose
 * boundary no longer matches. A shared computation left with fewer than two
 * consumers is dissolved, and the models depending on it are replayed in turn.
 */

import { collectReferences, relationsEqual } from '../ast/traverse.js';
import {
	AmbiguousSchemaError, DivergentMaterializationError, MisuseError, type RecoverableError,
} from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { coreRelation, findBoundaries, type BoundaryOccurrence } from '../cse/boundary.js';
import { buildSharedTree, rewriteConsumer } from '../cse/rewrite.js';
import {
	extendSchema, mergeNames, requiredColumns, schemaNames, shrinkSchema, type SchemaColumn,
} from '../cse/schema-unifier.js';
import { isSharedModel, type Model, type SharedComputationInfo } from '../graph/model.js';
import type { ModelGraph } from '../graph/model-graph.js';
import { transition, type SharedState, type StateTransition } from './lifecycle.js';

const log = createLogger('tracker:reconcile');

export class Reconciler {
	readonly transitions: StateTransition[] = [];
	readonly diagnostics: RecoverableError[] = [];
	private readonly dissolved = new Set<string>();
	private readonly queue: string[] = [];

	constructor(private readonly graph: ModelGraph) { }

	/**
	 * Withdraw a model from every shared computation it consumes.
	 */
	detach(model: string, reason: string): void {
		for (const shared of this.graph.sharedComputations()) {
			if (shared.shared.consumers.includes(model)) {
				this.leave(shared.name, model, reason);
			}
		}
	}

	/**
	 * Replay the given models, then everything their changes make stale, and finally
	 * drop dissolved shared computations from the graph.
	 */
	reconcile(models: readonly string[]): void {
		this.queue.push(...models);
		for (let name = this.queue.shift(); name !== undefined; name = this.queue.shift()) {
			const model = this.graph.getModel(name);
			if (!model || isSharedModel(model)) continue;
			this.replay(model);
		}

		if (this.dissolved.size > 0) {
			const names = [...this.dissolved].sort();
			this.graph.applyChanges([], names);
			log('Removed dissolved shared computation(s): %s', names.join(', '));
		}
	}

	private replay(model: Model): void {
		let tree = model.sourceTree;

		for (const { name } of this.graph.sharedComputations()) {
			if (this.dissolved.has(name)) continue;
			const info = this.sharedInfo(name);
			const member = info.consumers.includes(model.name);

			if (model.hint === 'never') {
				if (member) this.leave(name, model.name, `${model.name} opted out of sharing`);
				continue;
			}

			const occurrences = findBoundaries(tree, model.name).filter(o => matchesCore(o, info));
			if (occurrences.length === 0) {
				if (member) {
					this.diagnostics.push(new DivergentMaterializationError(model.name, name));
					this.leave(name, model.name, `${model.name} diverged`);
				}
				continue;
			}

			const required = occurrences.reduce<string[]>((acc, o) => mergeNames(acc, requiredColumns(tree, o)), []);
			let schema: SchemaColumn[];
			try {
				schema = occurrences.reduce<SchemaColumn[]>(
					(acc, o) => extendSchema(info.fingerprint.key, acc, { model: model.name, outputs: o.outputs, required }),
					[...info.schema],
				);
			} catch (error) {
				if (!(error instanceof AmbiguousSchemaError)) throw error;
				this.diagnostics.push(error);
				if (member) this.leave(name, model.name, `${model.name} redefines column ${error.column}`);
				continue;
			}

			const requirements = { ...info.requirements, [model.name]: required };
			schema = shrinkSchema(schema, requirements);
			this.updateShared(name, {
				...info,
				schema,
				consumers: mergeNames(info.consumers, [model.name]),
				requirements,
			}, member ? `${model.name} changed its columns` : `${model.name} joined`);

			tree = rewriteConsumer(tree, occurrences, name, required);
		}

		this.graph.applyChanges([{ ...this.graph.requireModel(model.name), tree }], []);
		log('Replayed %s', model.name);
	}

	private leave(name: string, consumer: string, reason: string): void {
		const info = this.sharedInfo(name);
		const consumers = info.consumers.filter(c => c !== consumer);
		const requirements = Object.fromEntries(Object.entries(info.requirements).filter(([c]) => c !== consumer));

		if (consumers.length >= 2) {
			this.updateShared(name, {
				...info,
				schema: shrinkSchema(info.schema, requirements),
				consumers,
				requirements,
			}, reason);
			return;
		}

		this.record(name, info.state, 'dissolved', reason);
		this.dissolved.add(name);
		this.store(name, { ...info, consumers, requirements, state: 'dissolved' }, false);

		// Remaining consumers get their inline computation back
		this.queue.push(...consumers);
		// Shared computations built over this one can no longer be reproduced
		for (const other of this.graph.sharedComputations()) {
			if (!this.dissolved.has(other.name) && collectReferences(other.tree).includes(name)) {
				this.queue.push(...other.shared.consumers);
			}
		}
	}

	/**
	 * Store new bookkeeping; a changed schema passes through `evolving` and rebuilds the tree.
	 */
	private updateShared(name: string, next: SharedComputationInfo, reason: string): void {
		const previous = this.sharedInfo(name);
		const evolved = schemaNames(previous.schema).join(',') !== schemaNames(next.schema).join(',');
		if (evolved) {
			this.record(name, previous.state, 'evolving', reason);
			this.record(name, 'evolving', 'active', 'schema rebuilt');
		}
		this.store(name, next, evolved);
	}

	private store(name: string, info: SharedComputationInfo, rebuild: boolean): void {
		const model = this.graph.requireModel(name);
		const tree = rebuild ? buildSharedTree(info.core, info.schema) : model.tree;
		this.graph.applyChanges([{ ...model, sourceTree: tree, tree, shared: info }], []);
	}

	private record(shared: string, from: SharedState, to: SharedState, reason: string): void {
		transition(from, to);
		this.transitions.push({ shared, from, to, reason });
		log('%s: %s -> %s (%s)', shared, from, to, reason);
	}

	private sharedInfo(name: string): SharedComputationInfo {
		const model = this.graph.requireModel(name);
		if (!isSharedModel(model)) {
			throw new MisuseError(`Model '${name}' is not a shared computation`);
		}
		return model.shared;
	}
}

function matchesCore(occurrence: BoundaryOccurrence, info: SharedComputationInfo): boolean {
	return occurrence.fingerprint.key === info.fingerprint.key
		&& relationsEqual(coreRelation(occurrence.core), coreRelation(info.core));
}
