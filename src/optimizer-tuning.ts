/**
 * Optimizer tuning parameters - centralized configuration for magic numbers
 */
export interface OptimizerTuning {
	/** Rule applications allowed per pass before giving up on a fixpoint */
	readonly maxIterations: number;

	/** Per-model budget for a catalog row estimate, in milliseconds */
	readonly statsTimeoutMs: number;

	/** Name prefix for synthesized shared-computation models */
	readonly sharedModelPrefix: string;

	/** Materialization planner */
	readonly materialization: {
		/** Largest row estimate still treated as a small result */
		readonly smallVolumeRows: number;
		/** Require the same new strategy on two consecutive passes before switching */
		readonly hysteresis: boolean;
	};
}

/**
 * Partial overrides accepted by the optimizer
 */
export type TuningOverrides = Partial<Omit<OptimizerTuning, 'materialization'>> & {
	readonly materialization?: Partial<OptimizerTuning['materialization']>;
};

/**
 * Default optimizer tuning parameters
 */
export const DEFAULT_TUNING: OptimizerTuning = {
	maxIterations: 64,
	statsTimeoutMs: 250,
	sharedModelPrefix: 'shared_',
	materialization: {
		smallVolumeRows: 10000,
		hysteresis: true
	}
};

export function resolveTuning(overrides: TuningOverrides = {}): OptimizerTuning {
	return {
		...DEFAULT_TUNING,
		...overrides,
		materialization: { ...DEFAULT_TUNING.materialization, ...overrides.materialization },
	};
}
