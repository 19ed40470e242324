import type { Context } from '@keyseal/core';

/** Collector for repeated `-c key=value` options. */
export function collectPair(value: string, previous: string[] = []): string[] {
	return [...previous, value];
}

/**
 * Builds a context from `key=value` pairs. The value may itself contain
 * `=`; the key may not be empty or repeated.
 */
export function parseContextPairs(pairs: readonly string[]): Context {
	const context: Record<string, string> = Object.create(null);
	for (const pair of pairs) {
		const separator = pair.indexOf('=');
		if (separator <= 0) {
			throw new Error(`Context entries must look like key=value, got: ${pair}`);
		}
		const key = pair.slice(0, separator);
		if (Object.hasOwn(context, key)) {
			throw new Error(`Duplicate context key: ${key}`);
		}
		context[key] = pair.slice(separator + 1);
	}
	return context;
}
