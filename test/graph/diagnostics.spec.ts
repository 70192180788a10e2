import { expect } from 'chai';
import { ref, scan } from '../../src/ast/build.js';
import { DiagnosticSeverity, validateModels } from '../../src/graph/diagnostics.js';
import { chainModels } from '../support/fixtures.js';

describe('validateModels', () => {
	it('reports nothing for a well-formed set', () => {
		expect(validateModels(chainModels())).to.deep.equal([]);
	});

	it('reports every problem in a single pass', () => {
		const diagnostics = validateModels([
			{ name: 'x', tree: ref('y') },
			{ name: 'x', tree: scan('t') },
			{ name: 'z', tree: scan('t'), references: ['x'] },
			{ name: 'c', tree: ref('d') },
			{ name: 'd', tree: ref('c') },
		]);
		expect(diagnostics.map(d => d.code)).to.deep.equal([
			'duplicate-model', 'unresolved-reference', 'unused-declared-reference', 'cyclic-dependency',
		]);
		expect(diagnostics[1]).to.deep.equal({
			severity: DiagnosticSeverity.Error,
			model: 'x',
			code: 'unresolved-reference',
			message: `Undefined model reference: 'y'`,
		});
		expect(diagnostics[3].message).to.equal('Dependency cycle: c -> d -> c');
		expect(diagnostics[0].severity).to.equal(DiagnosticSeverity.Warning);
	});

	it('reports a self-reference as a cycle', () => {
		const diagnostics = validateModels([{ name: 'loop', tree: ref('loop') }]);
		expect(diagnostics.map(d => d.message)).to.deep.equal(['Dependency cycle: loop -> loop']);
	});
});
