// Errors
export {
	FatalPrimitiveError,
	InvalidContextError,
	InvalidMasterKeyError,
	KmsError,
	KmsUnavailableError,
	UnsealError,
	UnsupportedOperationError,
} from './errors/index.js';
export type { KmsErrorCode } from './errors/index.js';

// Interfaces
export type { IKmsProvider } from './interfaces/index.js';

// Types
export type { Context, GeneratedDataKey, KmsInfo } from './types/index.js';
