import { randomBytes } from 'node:crypto';
import { readFileSync } from 'node:fs';
import { InvalidMasterKeyError } from '@keyseal/core';

export const MASTER_KEY_LENGTH = 32;

const HEX_PATTERN = /^[0-9a-fA-F]*$/;

export interface MasterKeySpec {
	readonly keyId: string;
	readonly masterKey: Buffer;
}

/**
 * Parses a master key given as `<key-id>:<hex>`, e.g.
 * `my-key:6368616e676520746869732070617373776f726420746f206120736563726574`.
 */
export function parseMasterKey(value: string): MasterKeySpec {
	const separator = value.indexOf(':');
	if (separator === -1) {
		throw new InvalidMasterKeyError('Master key must have the form <key-id>:<hex-key>');
	}

	const keyId = value.slice(0, separator).trim();
	if (keyId.length === 0) {
		throw new InvalidMasterKeyError('Master key ID must not be empty');
	}

	return { keyId, masterKey: decodeHexKey(value.slice(separator + 1).trim()) };
}

/** Reads a hex-encoded master key from a file. Surrounding whitespace is ignored. */
export function loadMasterKeyFile(keyFilePath: string, keyId: string): MasterKeySpec {
	const hex = readFileSync(keyFilePath, 'utf-8').trim();
	return { keyId, masterKey: decodeHexKey(hex) };
}

/** A fresh random master key in `<key-id>:<hex>` form. */
export function generateMasterKey(keyId: string): string {
	if (keyId.length === 0 || keyId.includes(':')) {
		throw new InvalidMasterKeyError(`Invalid master key ID: "${keyId}"`);
	}
	return `${keyId}:${randomBytes(MASTER_KEY_LENGTH).toString('hex')}`;
}

function decodeHexKey(hex: string): Buffer {
	if (!HEX_PATTERN.test(hex) || hex.length !== MASTER_KEY_LENGTH * 2) {
		throw new InvalidMasterKeyError(
			`Master key must be ${MASTER_KEY_LENGTH} bytes (${MASTER_KEY_LENGTH * 2} hex chars)`,
		);
	}
	return Buffer.from(hex, 'hex');
}
