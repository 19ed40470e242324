import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';
import { UnsealError } from '@keyseal/core';

// Package layout:
//   version (1) | cipher suite (1) | payload length - 1 (2, LE) | nonce (12) | ciphertext | tag (16)
// The first nonce bit marks the final package; a sealed key is always one final package.

const ALGORITHM = 'aes-256-gcm';
const VERSION = 0x20;
const SUITE_AES_256_GCM = 0x00;
const FINAL_FLAG = 0x80;

export const HEADER_SIZE = 16;
export const NONCE_SIZE = 12;
export const TAG_SIZE = 16;
export const PACKAGE_OVERHEAD = HEADER_SIZE + TAG_SIZE;
export const MAX_PAYLOAD_SIZE = 1 << 16;
export const KEY_SIZE = 32;

export type NonceSource = (size: number) => Uint8Array;

export function sealedSize(payloadSize: number): number {
	return payloadSize + PACKAGE_OVERHEAD;
}

/**
 * Encrypts `plaintext` under `key` into a single authenticated package.
 * The header's first four bytes are authenticated as associated data.
 */
export function sealPackage(
	key: Uint8Array,
	plaintext: Uint8Array,
	nonceSource: NonceSource = randomBytes,
): Buffer {
	if (key.length !== KEY_SIZE) {
		throw new RangeError(`Sealing key must be ${KEY_SIZE} bytes, got ${key.length}`);
	}
	if (plaintext.length === 0 || plaintext.length > MAX_PAYLOAD_SIZE) {
		throw new RangeError(`Payload must be 1..${MAX_PAYLOAD_SIZE} bytes, got ${plaintext.length}`);
	}
	const nonce = nonceSource(NONCE_SIZE);
	if (nonce.length !== NONCE_SIZE) {
		throw new RangeError(`Nonce must be ${NONCE_SIZE} bytes, got ${nonce.length}`);
	}

	const header = Buffer.alloc(HEADER_SIZE);
	header[0] = VERSION;
	header[1] = SUITE_AES_256_GCM;
	header.writeUInt16LE(plaintext.length - 1, 2);
	header.set(nonce, 4);
	header[4] |= FINAL_FLAG;

	const cipher = createCipheriv(ALGORITHM, key, header.subarray(4, HEADER_SIZE));
	cipher.setAAD(header.subarray(0, 4));
	const encrypted = Buffer.concat([cipher.update(plaintext), cipher.final()]);

	return Buffer.concat([header, encrypted, cipher.getAuthTag()]);
}

/**
 * Reverses {@link sealPackage}. Every failure, structural or
 * cryptographic, surfaces as the same {@link UnsealError}.
 */
export function openPackage(key: Uint8Array, sealed: Uint8Array): Buffer {
	if (key.length !== KEY_SIZE || sealed.length <= PACKAGE_OVERHEAD) {
		throw new UnsealError();
	}

	const buf = Buffer.from(sealed.buffer, sealed.byteOffset, sealed.byteLength);
	const header = buf.subarray(0, HEADER_SIZE);
	const payloadSize = header.readUInt16LE(2) + 1;

	if (
		header[0] !== VERSION ||
		header[1] !== SUITE_AES_256_GCM ||
		(header[4] & FINAL_FLAG) === 0 ||
		buf.length !== sealedSize(payloadSize)
	) {
		throw new UnsealError();
	}

	const ciphertext = buf.subarray(HEADER_SIZE, HEADER_SIZE + payloadSize);
	const authTag = buf.subarray(HEADER_SIZE + payloadSize);

	try {
		const decipher = createDecipheriv(ALGORITHM, key, header.subarray(4, HEADER_SIZE));
		decipher.setAAD(header.subarray(0, 4));
		decipher.setAuthTag(authTag);
		return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
	} catch {
		throw new UnsealError();
	}
}
