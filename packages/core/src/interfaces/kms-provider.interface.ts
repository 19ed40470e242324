import type { Context } from '../types/context.js';
import type { GeneratedDataKey } from '../types/data-key.js';
import type { KmsInfo } from '../types/kms-info.js';

/**
 * An active connection to a key-management service. Generates data keys
 * sealed under a master key and unseals them again.
 */
export interface IKmsProvider {
	readonly name: string;

	/**
	 * Key ID used whenever a caller asks for KMS-based encryption without
	 * naming a key explicitly.
	 */
	defaultKeyId(): string;

	/** Provisions a new master key with the given ID at the KMS. */
	createKey(keyId: string): Promise<void>;

	/**
	 * Generates a fresh random data key protected by the master key
	 * referenced by `keyId`.
	 *
	 * The context is cryptographically bound to the sealed key. The same
	 * context must be supplied again to unseal it.
	 */
	generateKey(keyId: string, context?: Context): Promise<GeneratedDataKey>;

	/**
	 * Unseals a key produced by {@link IKmsProvider.generateKey}. Fails
	 * unless `keyId` and `context` match the values used at generation.
	 */
	unsealKey(keyId: string, sealedKey: Uint8Array, context?: Context): Promise<Uint8Array>;

	info(): KmsInfo;

	healthCheck(): Promise<boolean>;

	/** Wipe any in-memory key material */
	destroy(): Promise<void>;
}
