/**
 * Catalog statistics collaborator for the optimizer
 * Supplies row-volume estimates used by the materialization planner
 */

import { createLogger } from '../common/logger.js';
import type { MaybePromise } from '../common/types.js';

const log = createLogger('stats:catalog');

/**
 * Catalog statistics interface
 */
export interface CatalogStats {
	/**
	 * Get estimated row count produced by a model
	 * @param model Model name
	 * @returns Estimated row count, or undefined if unknown
	 */
	estimateRows(model: string): MaybePromise<number | undefined>;
}

/**
 * Fixed estimates, for drivers that already hold them and for tests
 */
export class StaticCatalogStats implements CatalogStats {
	private readonly estimates: ReadonlyMap<string, number>;

	constructor(estimates: Readonly<Record<string, number>> = {}) {
		this.estimates = new Map(Object.entries(estimates));
		log('Created static catalog stats (%d estimate(s))', this.estimates.size);
	}

	estimateRows(model: string): number | undefined {
		return this.estimates.get(model);
	}
}

export type RowEstimates = ReadonlyMap<string, number | undefined>;

/**
 * Look up every model concurrently. A lookup that throws, rejects, returns a
 * non-finite number or outlasts `timeoutMs` yields undefined for that model.
 */
export async function prefetchRowEstimates(
	catalog: CatalogStats | undefined,
	models: readonly string[],
	timeoutMs: number,
): Promise<RowEstimates> {
	const estimates = new Map<string, number | undefined>();
	if (!catalog) {
		for (const model of models) estimates.set(model, undefined);
		return estimates;
	}

	const results = await Promise.all(models.map(async model => {
		try {
			const rows = await withTimeout(Promise.resolve(catalog.estimateRows(model)), timeoutMs);
			return typeof rows === 'number' && Number.isFinite(rows) ? rows : undefined;
		} catch (error) {
			log('Row estimate for %s failed: %O', model, error);
			return undefined;
		}
	}));

	models.forEach((model, i) => estimates.set(model, results[i]));
	log('Prefetched %d row estimate(s), %d known', models.length, results.filter(r => r !== undefined).length);
	return estimates;
}

async function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T | undefined> {
	let timer: ReturnType<typeof setTimeout> | undefined;
	const timeout = new Promise<undefined>(resolve => {
		timer = setTimeout(() => resolve(undefined), ms);
	});
	try {
		return await Promise.race([promise, timeout]);
	} finally {
		clearTimeout(timer);
	}
}
