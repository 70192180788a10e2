import { expect } from 'chai';
import { scan } from '../../src/ast/build.js';
import {
	DEFAULT_BACKEND, MaterializationPlanner, nextStrategy, type BackendCapabilities,
} from '../../src/cse/materialization-planner.js';
import type { SharedComputationInfo } from '../../src/graph/model.js';
import { fingerprintRelation } from '../../src/normalize/fingerprint.js';
import { DEFAULT_TUNING } from '../../src/optimizer-tuning.js';

function planner(backend: Partial<BackendCapabilities> = {}): MaterializationPlanner {
	return new MaterializationPlanner({ ...DEFAULT_BACKEND, ...backend }, DEFAULT_TUNING);
}

describe('MaterializationPlanner', () => {
	it('rejects a single consumer', () => {
		expect(planner().plan({ consumerCount: 1, persistenceRequested: false, volume: 'small' }))
			.to.deep.equal({ materialize: false, reason: 'Only 1 consumer(s)' });
	});

	it('uses a view when persistence is requested', () => {
		const plan = planner().plan({ consumerCount: 2, persistenceRequested: true, volume: 'large' });
		expect(plan.materialize && plan.strategy).to.equal('view');
	});

	it('falls through to a temp table when views are missing', () => {
		const plan = planner({ supportsViews: false }).plan({ consumerCount: 2, persistenceRequested: true, volume: 'small' });
		expect(plan.materialize && plan.strategy).to.equal('temp-table');
	});

	it('keeps small results inline on a CTE-caching backend', () => {
		const caching = planner({ cachesCommonTableExpressions: true });
		const small = caching.plan({ consumerCount: 3, persistenceRequested: false, volume: 'small' });
		const large = caching.plan({ consumerCount: 3, persistenceRequested: false, volume: 'large' });
		const unknown = caching.plan({ consumerCount: 3, persistenceRequested: false, volume: 'unknown' });
		expect(small).to.deep.equal({ materialize: true, strategy: 'inline-cte', reason: 'Small result and backend caches CTEs' });
		expect(large).to.deep.equal({ materialize: true, strategy: 'temp-table', reason: 'large result volume' });
		expect(unknown.materialize && unknown.strategy).to.equal('temp-table');
	});

	it('prefers a temp table when CTEs are recomputed', () => {
		expect(planner().plan({ consumerCount: 2, persistenceRequested: false, volume: 'small' }))
			.to.deep.equal({ materialize: true, strategy: 'temp-table', reason: 'Backend does not cache CTEs' });
	});

	it('falls back when temp tables are unsupported', () => {
		const request = { consumerCount: 2, persistenceRequested: false, volume: 'large' as const };
		const cte = planner({ supportsTempTables: false, cachesCommonTableExpressions: true }).plan(request);
		const view = planner({ supportsTempTables: false }).plan(request);
		const none = planner({ supportsTempTables: false, supportsViews: false }).plan(request);
		expect(cte.materialize && cte.strategy).to.equal('inline-cte');
		expect(view.materialize && view.strategy).to.equal('view');
		expect(none).to.deep.equal({ materialize: false, reason: 'Backend has no way to materialize' });
	});

	it('classifies volume by the largest consumer estimate', () => {
		const p = planner();
		expect(p.classifyVolume(['a', 'b'], new Map([['a', 100], ['b', 10000]]))).to.equal('small');
		expect(p.classifyVolume(['a', 'b'], new Map([['a', 100], ['b', 10001]]))).to.equal('large');
		expect(p.classifyVolume(['a', 'b'], new Map<string, number | undefined>([['a', 100], ['b', undefined]]))).to.equal('unknown');
		expect(p.classifyVolume(['a', 'c'], new Map([['a', 100]]))).to.equal('unknown');
	});
});

describe('nextStrategy', () => {
	const info: SharedComputationInfo = {
		fingerprint: fingerprintRelation(scan('events')),
		core: { kind: 'select', input: scan('events', '_t0'), groupKeys: [] },
		schema: [],
		strategy: 'temp-table',
		consumers: ['a', 'b'],
		requirements: {},
		state: 'active',
		sequence: 1,
	};

	it('switches only after two consecutive recommendations under hysteresis', () => {
		const once = nextStrategy(info, 'inline-cte', true);
		expect(once.strategy).to.equal('temp-table');
		expect(once.pendingStrategy).to.equal('inline-cte');
		const twice = nextStrategy(once, 'inline-cte', true);
		expect(twice.strategy).to.equal('inline-cte');
		expect(twice.pendingStrategy).to.equal(undefined);
	});

	it('switches at once without hysteresis', () => {
		expect(nextStrategy(info, 'view', false).strategy).to.equal('view');
	});

	it('clears a pending switch the next pass does not confirm', () => {
		const pending = nextStrategy(info, 'inline-cte', true);
		const settled = nextStrategy(pending, 'temp-table', true);
		expect(settled.strategy).to.equal('temp-table');
		expect(settled.pendingStrategy).to.equal(undefined);
	});

	it('returns the same bookkeeping when nothing changes', () => {
		expect(nextStrategy(info, 'temp-table', true)).to.equal(info);
	});
});
