export type KmsErrorCode =
	| 'UNSUPPORTED_OPERATION'
	| 'UNSEAL_FAILED'
	| 'FATAL_PRIMITIVE_FAILURE'
	| 'KMS_UNAVAILABLE'
	| 'INVALID_MASTER_KEY'
	| 'INVALID_CONTEXT';

export class KmsError extends Error {
	constructor(
		public readonly code: KmsErrorCode,
		message: string,
	) {
		super(message);
		this.name = 'KmsError';
	}
}

export class UnsupportedOperationError extends KmsError {
	constructor(message: string) {
		super('UNSUPPORTED_OPERATION', message);
		this.name = 'UnsupportedOperationError';
	}
}

/**
 * Wrong key, tampered blob or mismatched key ID / context. The causes are
 * indistinguishable on purpose, so the message never says which one.
 */
export class UnsealError extends KmsError {
	constructor() {
		super('UNSEAL_FAILED', 'crypto: unable to unseal data key: key, context or sealed key mismatch');
		this.name = 'UnsealError';
	}
}

/**
 * The entropy source or the encryption primitive broke its contract.
 * Never handed back as an ordinary result; raised only through a fatal
 * handler that is expected to halt the process.
 */
export class FatalPrimitiveError extends KmsError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('FATAL_PRIMITIVE_FAILURE', message);
		this.name = 'FatalPrimitiveError';
		if (options?.cause !== undefined) {
			this.cause = options.cause;
		}
	}
}

export class KmsUnavailableError extends KmsError {
	constructor(message: string) {
		super('KMS_UNAVAILABLE', message);
		this.name = 'KmsUnavailableError';
	}
}

export class InvalidMasterKeyError extends KmsError {
	constructor(message: string) {
		super('INVALID_MASTER_KEY', message);
		this.name = 'InvalidMasterKeyError';
	}
}

/** A key ID or context string that is not well-formed UTF-16. */
export class InvalidContextError extends KmsError {
	constructor(message: string) {
		super('INVALID_CONTEXT', message);
		this.name = 'InvalidContextError';
	}
}
