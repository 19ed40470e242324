import { createHmac } from 'node:crypto';
import { InvalidContextError } from '@keyseal/core';
import { describe, expect, it } from 'vitest';
import { DERIVED_KEY_LENGTH, deriveKey } from '../key-derivation.js';

const masterKey = Buffer.alloc(32, 0x11);

function hmacHex(key: Uint8Array, message: string): string {
	return createHmac('sha256', key).update(message, 'utf-8').digest('hex');
}

describe('deriveKey', () => {
	it('is HMAC-SHA256 over the key ID followed by the canonical context', () => {
		const derived = deriveKey(masterKey, 'default', { object: 'o1', bucket: 'b1' });

		expect(derived.length).toBe(DERIVED_KEY_LENGTH);
		expect(derived.toString('hex')).toBe(
			hmacHex(masterKey, 'default{"bucket":"b1","object":"o1"}'),
		);
	});

	it('treats a missing context as an empty one', () => {
		const absent = deriveKey(masterKey, 'default');
		const empty = deriveKey(masterKey, 'default', {});

		expect(absent.toString('hex')).toBe(empty.toString('hex'));
		expect(absent.toString('hex')).toBe(hmacHex(masterKey, 'default{}'));
	});

	it('is deterministic and independent of context insertion order', () => {
		const a = deriveKey(masterKey, 'k', { x: '1', y: '2' });
		const b = deriveKey(masterKey, 'k', { y: '2', x: '1' });

		expect(a.toString('hex')).toBe(b.toString('hex'));
	});

	it('differs per key ID', () => {
		const a = deriveKey(masterKey, 'A', { x: '1' });
		const b = deriveKey(masterKey, 'B', { x: '1' });

		expect(a.toString('hex')).not.toBe(b.toString('hex'));
	});

	it('differs per context value', () => {
		const a = deriveKey(masterKey, 'A', { x: '1' });
		const b = deriveKey(masterKey, 'A', { x: '2' });

		expect(a.toString('hex')).not.toBe(b.toString('hex'));
	});

	it('differs per master key', () => {
		const a = deriveKey(masterKey, 'A');
		const b = deriveKey(Buffer.alloc(32, 0x22), 'A');

		expect(a.toString('hex')).not.toBe(b.toString('hex'));
	});

	it('rejects key IDs and contexts that are not well-formed UTF-16', () => {
		expect(() => deriveKey(masterKey, '\uD800')).toThrow('Key ID contains an unpaired UTF-16 surrogate');
		expect(() => deriveKey(masterKey, 'A', { x: '\uDFFF' })).toThrow(InvalidContextError);
	});

	it('derives distinct keys for U+FFFD and surrogate pairs', () => {
		const replacement = deriveKey(masterKey, 'A', { x: '\uFFFD' });
		const astral = deriveKey(masterKey, 'A', { x: '\u{10000}' });

		expect(replacement.toString('hex')).not.toBe(astral.toString('hex'));
	});
});
