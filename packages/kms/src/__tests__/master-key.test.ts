import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InvalidMasterKeyError } from '@keyseal/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { generateMasterKey, loadMasterKeyFile, parseMasterKey } from '../master-key.js';

const ZERO_HEX = '00'.repeat(32);

describe('parseMasterKey', () => {
	it('splits the key ID from the hex key', () => {
		const { keyId, masterKey } = parseMasterKey(`default:${ZERO_HEX}`);

		expect(keyId).toBe('default');
		expect(masterKey.length).toBe(32);
		expect(masterKey.every((b) => b === 0)).toBe(true);
	});

	it('accepts uppercase hex and trims whitespace around both parts', () => {
		const { keyId, masterKey } = parseMasterKey(` my-key : ${'AB'.repeat(32)} `);

		expect(keyId).toBe('my-key');
		expect(masterKey.toString('hex')).toBe('ab'.repeat(32));
	});

	it('rejects a value without a key ID separator', () => {
		expect(() => parseMasterKey(ZERO_HEX)).toThrow(InvalidMasterKeyError);
		expect(() => parseMasterKey(ZERO_HEX)).toThrow('<key-id>:<hex-key>');
	});

	it('rejects an empty key ID', () => {
		expect(() => parseMasterKey(`:${ZERO_HEX}`)).toThrow('Master key ID must not be empty');
	});

	it('rejects short keys and non-hex characters', () => {
		expect(() => parseMasterKey(`k:${'00'.repeat(16)}`)).toThrow('Master key must be 32 bytes');
		expect(() => parseMasterKey(`k:${'zz'.repeat(32)}`)).toThrow('Master key must be 32 bytes');
	});
});

describe('loadMasterKeyFile', () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = mkdtempSync(join(tmpdir(), 'master-key-test-'));
	});

	afterEach(() => {
		rmSync(tempDir, { recursive: true, force: true });
	});

	it('reads a hex key with a trailing newline', () => {
		const keyFilePath = join(tempDir, 'master.key');
		writeFileSync(keyFilePath, `${'11'.repeat(32)}\n`);

		const { keyId, masterKey } = loadMasterKeyFile(keyFilePath, 'file-key');

		expect(keyId).toBe('file-key');
		expect(masterKey.toString('hex')).toBe('11'.repeat(32));
	});

	it('rejects a file holding a 16-byte key', () => {
		const keyFilePath = join(tempDir, 'short.key');
		writeFileSync(keyFilePath, '11'.repeat(16));

		expect(() => loadMasterKeyFile(keyFilePath, 'file-key')).toThrow(InvalidMasterKeyError);
	});
});

describe('generateMasterKey', () => {
	it('produces a parseable key in <key-id>:<hex> form', () => {
		const value = generateMasterKey('k1');

		expect(value).toMatch(/^k1:[0-9a-f]{64}$/);
		expect(parseMasterKey(value).keyId).toBe('k1');
	});

	it('produces a different key each time', () => {
		expect(generateMasterKey('k1')).not.toBe(generateMasterKey('k1'));
	});

	it('rejects key IDs that would not parse back', () => {
		expect(() => generateMasterKey('')).toThrow(InvalidMasterKeyError);
		expect(() => generateMasterKey('a:b')).toThrow(InvalidMasterKeyError);
	});
});
