import { expect } from 'chai';
import { RuleRegistry, type OptimizationRule } from '../../src/rules/registry.js';
import { OptimizerError } from '../../src/common/errors.js';
import { StatusCode } from '../../src/common/types.js';

function inertRule(id: string, priority?: number): OptimizationRule<never> {
	return {
		id,
		priority,
		match: () => [],
		isApplicable: () => false,
		apply: (_match, graph) => graph,
	};
}

describe('RuleRegistry', () => {
	it('orders rules by priority, ties by registration', () => {
		const registry = new RuleRegistry();
		registry.register(inertRule('late', 200));
		registry.register(inertRule('default-a'));
		registry.register(inertRule('early', 10));
		registry.register(inertRule('default-b'));
		expect(registry.rules().map(r => r.id)).to.deep.equal(['early', 'default-a', 'default-b', 'late']);
	});

	it('rejects duplicate ids', () => {
		const registry = new RuleRegistry();
		registry.register(inertRule('dup'));
		let caught: unknown;
		try {
			registry.register(inertRule('dup', 5));
		} catch (e) {
			caught = e;
		}
		expect(caught).to.be.instanceOf(OptimizerError);
		if (caught instanceof OptimizerError) {
			expect(caught.code).to.equal(StatusCode.MISUSE);
			expect(caught.message).to.equal(`Optimization rule 'dup' already registered`);
		}
	});

	it('unregisters by id', () => {
		const registry = new RuleRegistry();
		registry.register(inertRule('gone'));
		expect(registry.unregister('gone')).to.equal(true);
		expect(registry.unregister('gone')).to.equal(false);
		expect(registry.has('gone')).to.equal(false);
	});

	it('hands out a copy of the table', () => {
		const registry = new RuleRegistry();
		registry.register(inertRule('only'));
		const snapshot = registry.rules();
		registry.register(inertRule('later'));
		expect(snapshot).to.have.length(1);
	});
});
