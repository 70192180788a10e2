import { expect } from 'chai';
import { cte, cteRef, pick, ref, scan, select } from '../../src/ast/build.js';
import { renderSql } from '../../src/ast/render.js';
import { detectCandidates } from '../../src/cse/detector.js';
import {
	buildSharedTree, extractSharedComputation, pruneUnusedCtes, sharedModelName, sharedReader,
} from '../../src/cse/rewrite.js';
import { unifySchema } from '../../src/cse/schema-unifier.js';
import { ModelGraph } from '../../src/graph/model-graph.js';
import { sessionModels } from '../support/fixtures.js';

describe('rewrite', () => {
	function extractSessions(): { before: ModelGraph; after: ModelGraph; shared: string } {
		const before = new ModelGraph(sessionModels());
		const [candidate] = detectCandidates(before);
		const unified = unifySchema(candidate.fingerprint.key, candidate.occurrences, m => before.requireModel(m).tree);
		const { graph, shared } = extractSharedComputation(before, {
			fingerprint: candidate.fingerprint,
			core: candidate.occurrences[0].core,
			occurrences: candidate.occurrences,
			schema: unified.schema,
			requirements: unified.requirements,
			strategy: 'temp-table',
		}, 'shared_');
		return { before, after: graph, shared };
	}

	it('builds the shared tree from the core and schema', () => {
		const { after, shared } = extractSessions();
		expect(renderSql(after.requireModel(shared).tree)).to.equal(
			'select session_bucket(ts, 30) as session_id, user_id, min(country) as country, min(day) as day, '
			+ 'count(*) as event_count, min(hour) as hour from events as _t0 group by session_bucket(ts, 30), user_id',
		);
	});

	it('points every consumer at the shared model', () => {
		const { after, shared } = extractSessions();
		expect(shared).to.match(/^shared_[0-9a-f]{8}$/);
		expect(after.getConsumers(shared)).to.deep.equal(['sessions_by_country', 'sessions_by_day', 'sessions_by_hour']);
		expect(renderSql(after.requireModel('sessions_by_day').tree)).to.equal(
			`with sessions as (select day, event_count from ref('${shared}')) `
			+ 'select day, sum(event_count) as total_events, count(*) as session_count from sessions group by day',
		);
	});

	it('records bookkeeping on the shared model and leaves the input graph alone', () => {
		const { before, after, shared } = extractSessions();
		const info = after.requireModel(shared).shared;
		expect(info?.state).to.equal('active');
		expect(info?.sequence).to.equal(1);
		expect(info?.strategy).to.equal('temp-table');
		expect(info?.consumers).to.deep.equal(['sessions_by_country', 'sessions_by_day', 'sessions_by_hour']);
		expect(before.hasModel(shared)).to.equal(false);
		expect(after.requireModel('sessions_by_hour').sourceTree).to.equal(before.requireModel('sessions_by_hour').sourceTree);
	});

	it('suffixes the shared name on collision', () => {
		const { before } = extractSessions();
		const [candidate] = detectCandidates(before);
		const base = `shared_${candidate.fingerprint.hash.slice(0, 8)}`;
		before.addModel({ name: base, tree: scan('t') });
		expect(sharedModelName(before, candidate.fingerprint, 'shared_')).to.equal(`${base}_2`);
	});

	it('builds a distinct select for distinct cores', () => {
		const tree = buildSharedTree(
			{ kind: 'select', input: scan('events', '_t0'), groupKeys: [], distinctColumns: [pick('day')] },
			[{ name: 'day', expr: pick('day').expr, role: 'group' }],
		);
		expect(renderSql(tree)).to.equal('select distinct day from events as _t0');
	});

	it('reads only the required columns', () => {
		expect(sharedReader('shared_x', ['a', 'b'])).to.deep.equal(select(ref('shared_x'), [pick('a'), pick('b')]));
	});

	it('prunes CTEs nothing reads, respecting shadowing', () => {
		expect(pruneUnusedCtes(cte('a', scan('t'), select(scan('u'), [pick('x')])))).to.deep.equal(select(scan('u'), [pick('x')]));
		const shadowed = cte('a', scan('t'), cte('a', scan('u'), select(cteRef('a'), [pick('x')])));
		expect(pruneUnusedCtes(shadowed)).to.deep.equal(cte('a', scan('u'), select(cteRef('a'), [pick('x')])));
	});
});
