export {
	FatalPrimitiveError,
	InvalidContextError,
	InvalidMasterKeyError,
	KmsError,
	KmsUnavailableError,
	UnsealError,
	UnsupportedOperationError,
} from './kms-errors.js';
export type { KmsErrorCode } from './kms-errors.js';
