import { MisuseError } from '../common/errors.js';

/**
 * Lifecycle of a shared computation.
 *
 *   candidate -> active -> evolving -> active
 *                      \-> dissolved
 *            evolving  --> dissolved
 */
export type SharedState = 'candidate' | 'active' | 'evolving' | 'dissolved';

const TRANSITIONS: Readonly<Record<SharedState, readonly SharedState[]>> = {
	candidate: ['active'],
	active: ['evolving', 'dissolved'],
	evolving: ['active', 'dissolved'],
	dissolved: [],
};

export interface StateTransition {
	readonly shared: string;
	readonly from: SharedState;
	readonly to: SharedState;
	readonly reason: string;
}

export function canTransition(from: SharedState, to: SharedState): boolean {
	return TRANSITIONS[from].includes(to);
}

/**
 * @returns the target state
 * @throws MisuseError for a transition the lifecycle does not allow
 */
export function transition(from: SharedState, to: SharedState): SharedState {
	if (!canTransition(from, to)) {
		throw new MisuseError(`Illegal shared computation transition ${from} -> ${to}`);
	}
	return to;
}
