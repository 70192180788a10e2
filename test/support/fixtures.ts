import { aggregate, as, call, col, cte, cteRef, lit, pick, ref, scan, withCtes } from '../../src/ast/build.js';
import type { Relation } from '../../src/ast/nodes.js';
import type { ModelInput } from '../../src/graph/model.js';
import type { Tables } from './evaluator.js';

export const tables: Tables = {
	events: [
		{ user_id: 1, ts: 0, day: 'mon', hour: 9, country: 'NL' },
		{ user_id: 1, ts: 12, day: 'mon', hour: 9, country: 'NL' },
		{ user_id: 1, ts: 47, day: 'mon', hour: 10, country: 'NL' },
		{ user_id: 1, ts: 95, day: 'tue', hour: 8, country: 'NL' },
		{ user_id: 2, ts: 3, day: 'mon', hour: 9, country: 'DE' },
		{ user_id: 2, ts: 64, day: 'tue', hour: 11, country: 'DE' },
		{ user_id: 2, ts: 66, day: 'tue', hour: 11, country: 'DE' },
		{ user_id: 3, ts: 31, day: 'wed', hour: 14, country: 'FR' },
		{ user_id: 3, ts: 33, day: 'wed', hour: 14, country: 'FR' },
		{ user_id: 3, ts: 140, day: 'thu', hour: 16, country: 'FR' },
	],
	users: [
		{ user_id: 1, plan: 'free' },
		{ user_id: 2, plan: 'pro' },
		{ user_id: 3, plan: 'pro' },
	],
};

/**
 * Per-session rollup of events: one row per user and time bucket, plus one extra
 * per-session attribute that differs between consumers.
 */
export function sessionsRollup(extra: 'day' | 'hour' | 'country', bucketWidth = 30): Relation {
	return aggregate(
		scan('events'),
		[pick('user_id'), as(call('session_bucket', col('ts'), lit(bucketWidth)), 'session_id')],
		[as(call('count'), 'event_count'), as(call('min', col(extra)), extra)],
	);
}

/** A model that rolls sessions up further by one attribute. */
export function sessionsBy(extra: 'day' | 'hour' | 'country', bucketWidth = 30): Relation {
	return cte(
		'sessions',
		sessionsRollup(extra, bucketWidth),
		aggregate(
			cteRef('sessions'),
			[pick(extra)],
			[as(call('sum', col('event_count')), 'total_events'), as(call('count'), 'session_count')],
		),
	);
}

export function sessionModels(): ModelInput[] {
	return [
		{ name: 'sessions_by_day', tree: sessionsBy('day') },
		{ name: 'sessions_by_hour', tree: sessionsBy('hour') },
		{ name: 'sessions_by_country', tree: sessionsBy('country') },
	];
}

/** A linear chain with no repeated work: raw events, per-session rollup, per-user stats. */
export function chainModels(): ModelInput[] {
	return [
		{
			name: 'user_sessions',
			tree: aggregate(
				scan('events'),
				[pick('user_id'), as(call('session_bucket', col('ts'), lit(30)), 'session_id')],
				[as(call('count'), 'event_count')],
			),
		},
		{
			name: 'user_stats',
			tree: aggregate(
				ref('user_sessions'),
				[pick('user_id')],
				[as(call('count'), 'session_count'), as(call('sum', col('event_count')), 'total_events')],
			),
		},
	];
}

/**
 * Per-user event counts `s`, per-user totals `t` over them, and a grand total.
 * Only the function that builds `t.total` varies.
 */
export function nestedTotals(fn: 'sum' | 'max'): Relation {
	return withCtes(
		[
			['s', aggregate(scan('events'), [pick('user_id')], [as(call('count'), 'n')])],
			['t', aggregate(cteRef('s'), [pick('user_id')], [as(call(fn, col('n')), 'total')])],
		],
		aggregate(cteRef('t'), [], [as(call('sum', col('total')), 'grand_total')]),
	);
}
