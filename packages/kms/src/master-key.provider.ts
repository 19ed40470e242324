import { randomBytes } from 'node:crypto';
import {
	type Context,
	FatalPrimitiveError,
	type GeneratedDataKey,
	type IKmsProvider,
	InvalidMasterKeyError,
	type KmsInfo,
	KmsUnavailableError,
	UnsealError,
	UnsupportedOperationError,
} from '@keyseal/core';
import { Logger } from '@nestjs/common';
import { type FatalHandler, throwFatal } from './fatal.js';
import { deriveKey } from './key-derivation.js';
import { MASTER_KEY_LENGTH } from './master-key.js';
import { KEY_SIZE, type NonceSource, openPackage, sealPackage, sealedSize } from './sealed-package.js';

export const DATA_KEY_LENGTH = KEY_SIZE;
export const SEALED_KEY_LENGTH = sealedSize(DATA_KEY_LENGTH);

export interface MasterKeyKmsOptions {
	keyId: string;
	masterKey: Uint8Array;
	/** Entropy for data keys and nonces. Defaults to `crypto.randomBytes`. */
	randomSource?: NonceSource;
	onFatal?: FatalHandler;
}

/**
 * KMS backed by a single 256-bit master key.
 *
 * Any key ID is accepted. The key ID and the context are mixed into the
 * derived sealing key, so unsealing with a different ID or context fails
 * authentication instead of passing an equality check.
 */
export class MasterKeyKms implements IKmsProvider {
	readonly name = 'master-key';
	private readonly logger = new Logger(MasterKeyKms.name);
	private readonly keyId: string;
	private readonly masterKey: Buffer;
	private readonly randomSource: NonceSource;
	private readonly onFatal: FatalHandler;
	private destroyed = false;

	constructor(options: MasterKeyKmsOptions) {
		if (options.masterKey.length !== MASTER_KEY_LENGTH) {
			throw new InvalidMasterKeyError(
				`Master key must be ${MASTER_KEY_LENGTH} bytes, got ${options.masterKey.length} bytes`,
			);
		}
		this.keyId = options.keyId;
		this.masterKey = Buffer.from(options.masterKey);
		this.randomSource = options.randomSource ?? randomBytes;
		this.onFatal = options.onFatal ?? throwFatal;

		if (process.env.NODE_ENV === 'production') {
			this.logger.warn(
				'MasterKeyKms holds a single static key. ' +
					'Consider an external KMS for production deployments.',
			);
		}

		this.logger.log(`Master key loaded [keyId=${this.keyId}]`);
	}

	defaultKeyId(): string {
		return this.keyId;
	}

	async createKey(_keyId: string): Promise<void> {
		throw new UnsupportedOperationError(
			'crypto: creating keys is not supported by a static master key',
		);
	}

	async generateKey(keyId: string, context?: Context): Promise<GeneratedDataKey> {
		this.assertAvailable();

		// Rejects a malformed key ID or context before any entropy is drawn.
		const derivedKey = deriveKey(this.masterKey, keyId, context);

		try {
			const plaintextKey = this.drawDataKey();
			let sealedKey: Buffer;
			try {
				sealedKey = sealPackage(derivedKey, plaintextKey, this.randomSource);
			} catch (error: unknown) {
				plaintextKey.fill(0);
				return this.onFatal(
					new FatalPrimitiveError('KMS: unable to encrypt data key', { cause: error }),
				);
			}
			if (sealedKey.length !== SEALED_KEY_LENGTH) {
				plaintextKey.fill(0);
				return this.onFatal(
					new FatalPrimitiveError(
						`KMS: sealed data key is ${sealedKey.length} bytes, expected ${SEALED_KEY_LENGTH}`,
					),
				);
			}

			return { plaintextKey, sealedKey, keyId };
		} finally {
			derivedKey.fill(0);
		}
	}

	async unsealKey(keyId: string, sealedKey: Uint8Array, context?: Context): Promise<Uint8Array> {
		this.assertAvailable();

		const derivedKey = deriveKey(this.masterKey, keyId, context);
		try {
			const plaintextKey = openPackage(derivedKey, sealedKey);
			if (plaintextKey.length !== DATA_KEY_LENGTH) {
				plaintextKey.fill(0);
				throw new UnsealError();
			}
			return plaintextKey;
		} finally {
			derivedKey.fill(0);
		}
	}

	// Configured directly with a master key: no endpoints, no name.
	info(): KmsInfo {
		return {
			endpoints: [],
			name: '',
			authType: 'master-key',
		};
	}

	async healthCheck(): Promise<boolean> {
		return !this.destroyed;
	}

	async destroy(): Promise<void> {
		this.masterKey.fill(0);
		this.destroyed = true;
		this.logger.log('Master key wiped from memory');
	}

	private drawDataKey(): Uint8Array {
		let key: Uint8Array;
		try {
			key = this.randomSource(DATA_KEY_LENGTH);
		} catch (error: unknown) {
			return this.onFatal(
				new FatalPrimitiveError('KMS: entropy source unavailable', { cause: error }),
			);
		}
		if (key.length !== DATA_KEY_LENGTH) {
			return this.onFatal(
				new FatalPrimitiveError(
					`KMS: entropy source returned ${key.length} bytes, expected ${DATA_KEY_LENGTH}`,
				),
			);
		}
		return key;
	}

	private assertAvailable(): void {
		if (this.destroyed) {
			throw new KmsUnavailableError('KMS: master key has been wiped');
		}
	}
}
