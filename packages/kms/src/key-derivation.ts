import { createHmac } from 'node:crypto';
import type { Context } from '@keyseal/core';
import { appendContext, assertWellFormed } from './canonical-context.js';

export const DERIVED_KEY_LENGTH = 32;

/**
 * HMAC-SHA256(masterKey, keyId || canonical(context)).
 *
 * No separator sits between the two parts: the canonical context always
 * starts with `{`. A missing context derives like an empty one. A key ID
 * or context with an unpaired surrogate is rejected before hashing.
 */
export function deriveKey(masterKey: Uint8Array, keyId: string, context?: Context): Buffer {
	assertWellFormed(keyId, 'Key ID');
	const encodedContext = appendContext(new Uint8Array(0), context ?? {});
	const mac = createHmac('sha256', masterKey);
	mac.update(Buffer.from(keyId, 'utf-8'));
	mac.update(encodedContext);
	return mac.digest();
}
