import { describe, expect, it } from 'vitest';
import { collectPair, parseContextPairs } from '../context-args.js';

describe('parseContextPairs', () => {
	it('builds a context from key=value pairs', () => {
		expect(parseContextPairs(['bucket=b1', 'object=o1'])).toEqual({ bucket: 'b1', object: 'o1' });
	});

	it('keeps everything after the first = as the value', () => {
		expect(parseContextPairs(['query=a=b&c=d'])).toEqual({ query: 'a=b&c=d' });
	});

	it('allows empty values', () => {
		expect(parseContextPairs(['tag='])).toEqual({ tag: '' });
	});

	it('returns an empty context for no pairs', () => {
		expect(Object.keys(parseContextPairs([]))).toEqual([]);
	});

	it('rejects entries without a key', () => {
		expect(() => parseContextPairs(['=value'])).toThrow('Context entries must look like key=value, got: =value');
		expect(() => parseContextPairs(['novalue'])).toThrow('got: novalue');
	});

	it('rejects repeated keys', () => {
		expect(() => parseContextPairs(['a=1', 'a=2'])).toThrow('Duplicate context key: a');
	});

	it('keeps __proto__ as an ordinary key', () => {
		expect(Object.keys(parseContextPairs(['__proto__=x']))).toEqual(['__proto__']);
	});
});

describe('collectPair', () => {
	it('accumulates repeated option values in order', () => {
		expect(collectPair('b=2', collectPair('a=1'))).toEqual(['a=1', 'b=2']);
	});
});
