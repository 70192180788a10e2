/**
 * Non-throwing structural checks over a set of model inputs, for drivers that
 * want to report every problem before building a graph.
 */

import { collectReferences } from '../ast/traverse.js';
import type { ModelInput } from './model.js';

export enum DiagnosticSeverity {
	Error = 'error',
	Warning = 'warning',
	Info = 'info',
}

export interface Diagnostic {
	readonly severity: DiagnosticSeverity;
	readonly model: string;
	readonly message: string;
	readonly code: 'unresolved-reference' | 'cyclic-dependency' | 'duplicate-model' | 'unused-declared-reference';
}

export function validateModels(inputs: readonly ModelInput[]): Diagnostic[] {
	const diagnostics: Diagnostic[] = [];
	const byName = new Map<string, ModelInput>();

	for (const input of inputs) {
		if (byName.has(input.name)) {
			diagnostics.push({
				severity: DiagnosticSeverity.Warning,
				model: input.name,
				code: 'duplicate-model',
				message: `Model '${input.name}' is defined more than once; the first definition wins`,
			});
			continue;
		}
		byName.set(input.name, input);
	}

	const edges = new Map<string, string[]>();
	for (const [name, input] of byName) {
		const treeRefs = collectReferences(input.tree);
		const declared = input.references ?? [];
		const all = [...new Set([...treeRefs, ...declared])].sort();
		edges.set(name, all);

		for (const reference of all) {
			if (!byName.has(reference)) {
				diagnostics.push({
					severity: DiagnosticSeverity.Error,
					model: name,
					code: 'unresolved-reference',
					message: `Undefined model reference: '${reference}'`,
				});
			}
		}
		for (const reference of declared) {
			if (!treeRefs.includes(reference)) {
				diagnostics.push({
					severity: DiagnosticSeverity.Warning,
					model: name,
					code: 'unused-declared-reference',
					message: `Declared reference '${reference}' is never read by the query`,
				});
			}
		}
	}

	for (const cycle of findAllCycles(edges)) {
		diagnostics.push({
			severity: DiagnosticSeverity.Error,
			model: cycle[0],
			code: 'cyclic-dependency',
			message: `Dependency cycle: ${cycle.join(' -> ')}`,
		});
	}

	return diagnostics;
}

/**
 * One representative cycle per strongly connected group, each starting at its
 * alphabetically smallest member.
 */
function findAllCycles(edges: ReadonlyMap<string, readonly string[]>): string[][] {
	const cycles: string[][] = [];
	const reported = new Set<string>();

	for (const start of [...edges.keys()].sort()) {
		if (reported.has(start)) continue;
		const path = findPathBack(start, edges);
		if (path) {
			path.forEach(n => reported.add(n));
			cycles.push([...path, start]);
		}
	}
	return cycles;
}

function findPathBack(start: string, edges: ReadonlyMap<string, readonly string[]>): string[] | undefined {
	const visited = new Set<string>();
	const walk = (node: string, path: string[]): string[] | undefined => {
		for (const next of edges.get(node) ?? []) {
			if (next === start) return path;
			if (visited.has(next) || !edges.has(next)) continue;
			visited.add(next);
			const found = walk(next, [...path, next]);
			if (found) return found;
		}
		return undefined;
	};
	return walk(start, [start]);
}
