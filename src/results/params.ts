/**
 * Parameter Set
 *
 * Immutable name→value parameters of one measured configuration.
 *
 * @module src/results/params
 */

import type { BenchmarkParams, RunMode } from "../../types/results";

export class ParameterSet implements BenchmarkParams {
	private readonly values: ReadonlyMap<string, string>;

	constructor(
		readonly mode: RunMode,
		params: Iterable<readonly [string, string]> | Record<string, string> = {},
	) {
		const entries = isEntryIterable(params) ? Array.from(params) : Object.entries(params);
		this.values = new Map(entries);
	}

	keys(): readonly string[] {
		return Array.from(this.values.keys());
	}

	get(name: string): string | undefined {
		return this.values.get(name);
	}

	has(name: string): boolean {
		return this.values.has(name);
	}
}

function isEntryIterable(
	params: Iterable<readonly [string, string]> | Record<string, string>,
): params is Iterable<readonly [string, string]> {
	return Symbol.iterator in params;
}
