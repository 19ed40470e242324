import { type Context, InvalidContextError } from '@keyseal/core';

/** Anything with a `write` method — a Node `Writable`, a hash, a test sink. */
export interface ByteSink {
	write(chunk: Uint8Array): unknown;
}

const EMPTY = '{}';

// Under the u flag a surrogate pair reads as one astral code point, so only
// unpaired halves match.
const LONE_SURROGATE = /\p{Surrogate}/u;

/**
 * Throws {@link InvalidContextError} when `value` holds an unpaired UTF-16
 * surrogate. UTF-8 encoding maps every such half to U+FFFD, which would
 * let two different strings derive the same key.
 */
export function assertWellFormed(value: string, what: string): void {
	if (LONE_SURROGATE.test(value)) {
		throw new InvalidContextError(`${what} contains an unpaired UTF-16 surrogate`);
	}
}

/**
 * Canonical form of a context: a JSON-like object with keys in ascending
 * UTF-8 byte order and no whitespace, e.g. `{"a":"1","b":"2"}`.
 *
 * Neither keys nor values are escaped. A `"` or `\` inside the context
 * yields output that is not valid JSON, and two different contexts can
 * then share one encoding; see {@link hasAmbiguousCharacters}.
 *
 * Keys and values must be well-formed UTF-16.
 */
export function encodeContext(context: Context): string {
	const keys = Object.keys(context);
	for (const key of keys) {
		assertWellFormed(key, 'Context key');
		assertWellFormed(context[key], 'Context value');
	}
	if (keys.length === 0) {
		return EMPTY;
	}

	// No need to sort
	if (keys.length === 1) {
		const [key] = keys;
		return `{"${key}":"${context[key]}"}`;
	}

	const pairs = sortKeys(keys).map((key) => `"${key}":"${context[key]}"`);
	return `{${pairs.join(',')}}`;
}

/** Returns `dst` followed by the canonical UTF-8 bytes of `context`. */
export function appendContext(dst: Uint8Array, context: Context): Buffer {
	return Buffer.concat([dst, Buffer.from(encodeContext(context), 'utf-8')]);
}

/**
 * Writes the canonical encoding to `sink` and returns the number of
 * bytes written. Errors thrown by the sink propagate to the caller.
 */
export function writeContext(sink: ByteSink, context: Context): number {
	const bytes = Buffer.from(encodeContext(context), 'utf-8');
	sink.write(bytes);
	return bytes.length;
}

/**
 * True when a key or value contains a quote or backslash. Such contexts
 * can collide with a different context under the unescaped encoding.
 */
export function hasAmbiguousCharacters(context: Context): boolean {
	return Object.entries(context).some(
		([key, value]) => /["\\]/.test(key) || /["\\]/.test(value),
	);
}

// String comparison in JS works on UTF-16 code units, which orders
// astral characters before U+E000..U+FFFF. Compare the UTF-8 bytes instead.
function sortKeys(keys: string[]): string[] {
	return keys
		.map((key) => ({ key, bytes: Buffer.from(key, 'utf-8') }))
		.sort((a, b) => Buffer.compare(a.bytes, b.bytes))
		.map(({ key }) => key);
}
