import { expect } from 'chai';
import { scan } from '../../src/ast/build.js';
import { AmbiguousSchemaError, RuleNonterminatingError } from '../../src/common/errors.js';
import { OptimizationContext } from '../../src/context.js';
import { DEFAULT_BACKEND } from '../../src/cse/materialization-planner.js';
import { ModelGraph } from '../../src/graph/model-graph.js';
import { resolveTuning } from '../../src/optimizer-tuning.js';
import { RuleRegistry, type OptimizationRule } from '../../src/rules/registry.js';
import { RuleEngine } from '../../src/rules/rule-engine.js';

function contextFor(maxIterations = 16, signal?: AbortSignal): OptimizationContext {
	return new OptimizationContext(resolveTuning({ maxIterations }), DEFAULT_BACKEND, new Map(), signal);
}

function withModel(graph: ModelGraph, name: string): ModelGraph {
	const next = graph.clone();
	next.addModel({ name, tree: scan('events') });
	return next;
}

/** Adds each named model once. */
function addMissing(id: string, names: readonly string[], priority?: number): OptimizationRule<string> {
	return {
		id,
		priority,
		match: graph => names.filter(n => !graph.hasModel(n)),
		isApplicable: () => true,
		apply: (name, graph) => withModel(graph, name),
		describe: name => `add ${name}`,
	};
}

const grow: OptimizationRule<number> = {
	id: 'grow',
	match: graph => [graph.size],
	isApplicable: () => true,
	apply: (size, graph) => withModel(graph, `m${size}`),
};

function engineWith(...rules: OptimizationRule<unknown>[]): RuleEngine {
	const registry = new RuleRegistry();
	for (const rule of rules) registry.register(rule);
	return new RuleEngine(registry);
}

describe('RuleEngine', () => {
	it('applies rules until nothing matches', () => {
		const engine = engineWith(addMissing('add', ['a', 'b']));
		const input = new ModelGraph();
		const result = engine.run(input, contextFor());
		expect(result.applied).to.deep.equal([
			{ ruleId: 'add', iteration: 1, description: 'add a' },
			{ ruleId: 'add', iteration: 2, description: 'add b' },
		]);
		expect(result.reachedFixpoint).to.equal(true);
		expect(result.aborted).to.equal(false);
		expect(result.graph.size).to.equal(2);
		expect(input.size).to.equal(0);
	});

	it('lets the first rule in order win each iteration', () => {
		const engine = engineWith(addMissing('second', ['y']), addMissing('first', ['x'], 1));
		const result = engine.run(new ModelGraph(), contextFor());
		expect(result.applied.map(a => a.ruleId)).to.deep.equal(['first', 'second']);
	});

	it('skips matches that are not applicable', () => {
		const picky: OptimizationRule<string> = {
			...addMissing('picky', ['skip_me', 'take_me']),
			isApplicable: name => name !== 'skip_me',
		};
		const result = engineWith(picky).run(new ModelGraph(), contextFor());
		expect(result.applied.map(a => a.description)).to.deep.equal(['add take_me']);
		expect(result.graph.hasModel('skip_me')).to.equal(false);
	});

	it('stops at the iteration budget and reports it', () => {
		const result = engineWith(grow).run(new ModelGraph(), contextFor(3));
		expect(result.iterations).to.equal(3);
		expect(result.reachedFixpoint).to.equal(false);
		expect(result.graph.size).to.equal(3);
		expect(result.diagnostics).to.have.length(1);
		expect(result.diagnostics[0]).to.be.instanceOf(RuleNonterminatingError);
		expect(result.diagnostics[0].message).to.equal('Rule application did not reach a fixpoint within 3 iterations (last rule: grow)');
	});

	it('stops when the signal is already aborted', () => {
		const controller = new AbortController();
		controller.abort();
		const result = engineWith(grow).run(new ModelGraph(), contextFor(16, controller.signal));
		expect(result.aborted).to.equal(true);
		expect(result.applied).to.deep.equal([]);
	});

	it('checks the signal between applications', () => {
		const controller = new AbortController();
		const aborting: OptimizationRule<number> = {
			...grow,
			apply: (size, graph) => {
				controller.abort();
				return withModel(graph, `m${size}`);
			},
		};
		const result = engineWith(aborting).run(new ModelGraph(), contextFor(16, controller.signal));
		expect(result.aborted).to.equal(true);
		expect(result.iterations).to.equal(1);
		expect(result.graph.size).to.equal(1);
	});

	it('records recoverable errors and keeps going', () => {
		const failing: OptimizationRule<never> = {
			id: 'failing',
			match: () => {
				throw new AmbiguousSchemaError('x', 'k1', ['a', 'b']);
			},
			isApplicable: () => true,
			apply: (_match, graph) => graph,
		};
		const result = engineWith(failing, addMissing('add', ['a'])).run(new ModelGraph(), contextFor());
		expect(result.applied.map(a => a.ruleId)).to.deep.equal(['add']);
		expect(result.reachedFixpoint).to.equal(true);
		// The same error from every iteration is recorded once
		expect(result.diagnostics.map(d => d.name)).to.deep.equal(['AmbiguousSchemaError']);
	});

	it('propagates other errors', () => {
		const broken: OptimizationRule<never> = {
			id: 'broken',
			match: () => {
				throw new TypeError('boom');
			},
			isApplicable: () => true,
			apply: (_match, graph) => graph,
		};
		expect(() => engineWith(broken).run(new ModelGraph(), contextFor())).to.throw(TypeError, 'boom');
	});
});
