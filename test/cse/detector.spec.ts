import { expect } from 'chai';
import { aggregate, as, call, col, cte, cteRef, eq, filter, gt, join, lit, pick, scan, select, subquery } from '../../src/ast/build.js';
import type { Relation } from '../../src/ast/nodes.js';
import { detectCandidates, subsumes } from '../../src/cse/detector.js';
import { ModelGraph } from '../../src/graph/model-graph.js';
import { chainModels, sessionModels } from '../support/fixtures.js';

function nlUsers(alias: string): Relation {
	return select(
		subquery(aggregate(filter(scan('events', alias), eq(col('country', alias), lit('NL'))), [pick('user_id', alias)], [as(call('count'), 'n')]), 's'),
		[pick('user_id', 's')],
	);
}

function layered(): Relation {
	return cte(
		'per_user',
		aggregate(scan('events'), [pick('user_id')], [as(call('count'), 'n')]),
		cte(
			'active',
			select(filter(cteRef('per_user'), gt(col('n'), lit(1))), [pick('user_id')]),
			select(cteRef('active'), [pick('user_id')]),
		),
	);
}

describe('detectCandidates', () => {
	it('groups the session rollup across three models', () => {
		const candidates = detectCandidates(new ModelGraph(sessionModels()));
		expect(candidates).to.have.length(1);
		expect(candidates[0].consumers).to.deep.equal(['sessions_by_country', 'sessions_by_day', 'sessions_by_hour']);
		expect(candidates[0].occurrences.map(o => o.model)).to.deep.equal(candidates[0].consumers);
	});

	it('finds nothing in a chain without repeated work', () => {
		expect(detectCandidates(new ModelGraph(chainModels()))).to.deep.equal([]);
	});

	it('matches computations that differ only in aliases', () => {
		const graph = new ModelGraph([
			{ name: 'a', tree: nlUsers('e') },
			{ name: 'b', tree: nlUsers('ev') },
		]);
		const candidates = detectCandidates(graph);
		expect(candidates.map(c => c.consumers)).to.deep.equal([['a', 'b']]);
	});

	it('needs two distinct models', () => {
		const perUser = aggregate(scan('events'), [pick('user_id')], [as(call('count'), 'n')]);
		const twice = select(join('cross', subquery(perUser, 'p'), subquery(perUser, 'q')), [pick('user_id', 'p')]);
		const graph = new ModelGraph([
			{ name: 'solo', tree: twice },
			{ name: 'other', tree: scan('users') },
		]);
		expect(detectCandidates(graph)).to.deep.equal([]);
	});

	it('keeps only the outermost boundary shared by the same consumers', () => {
		const graph = new ModelGraph([
			{ name: 'a', tree: layered() },
			{ name: 'b', tree: layered() },
		]);
		const candidates = detectCandidates(graph);
		expect(candidates).to.have.length(1);
		expect(candidates[0].occurrences.map(o => o.path)).to.deep.equal([[1, 0], [1, 0]]);
	});

	it('keeps nested boundaries on request', () => {
		const graph = new ModelGraph([
			{ name: 'a', tree: layered() },
			{ name: 'b', tree: layered() },
		]);
		const candidates = detectCandidates(graph, { keepNested: true });
		expect(candidates).to.have.length(2);
		const paths = candidates.map(c => c.occurrences[0].path);
		expect(paths).to.deep.include([0]);
		expect(paths).to.deep.include([1, 0]);
		const [outer] = candidates.filter(c => c.occurrences[0].path.length === 2);
		const [inner] = candidates.filter(c => c.occurrences[0].path.length === 1);
		expect(subsumes(outer, inner)).to.equal(true);
		expect(subsumes(inner, outer)).to.equal(false);
	});

	it('leaves excluded models out', () => {
		const candidates = detectCandidates(new ModelGraph(sessionModels()), { exclude: name => name === 'sessions_by_hour' });
		expect(candidates[0].consumers).to.deep.equal(['sessions_by_country', 'sessions_by_day']);
	});
});
