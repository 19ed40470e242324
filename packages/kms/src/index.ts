export {
	appendContext,
	assertWellFormed,
	encodeContext,
	hasAmbiguousCharacters,
	writeContext,
} from './canonical-context.js';
export type { ByteSink } from './canonical-context.js';

export { DERIVED_KEY_LENGTH, deriveKey } from './key-derivation.js';

export {
	HEADER_SIZE,
	MAX_PAYLOAD_SIZE,
	PACKAGE_OVERHEAD,
	TAG_SIZE,
	openPackage,
	sealPackage,
	sealedSize,
} from './sealed-package.js';
export type { NonceSource } from './sealed-package.js';

export {
	MASTER_KEY_LENGTH,
	generateMasterKey,
	loadMasterKeyFile,
	parseMasterKey,
} from './master-key.js';
export type { MasterKeySpec } from './master-key.js';

export { exitOnFatal, throwFatal } from './fatal.js';
export type { FatalHandler } from './fatal.js';

export { DATA_KEY_LENGTH, MasterKeyKms, SEALED_KEY_LENGTH } from './master-key.provider.js';
export type { MasterKeyKmsOptions } from './master-key.provider.js';
