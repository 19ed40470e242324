import type { FatalPrimitiveError } from '@keyseal/core';
import { Logger } from '@nestjs/common';

/**
 * Receives failures of the entropy source or the encryption primitive.
 * It must not return: the operation that raised it has no valid key to
 * hand back.
 */
export type FatalHandler = (error: FatalPrimitiveError) => never;

const logger = new Logger('KmsFatal');

/** Logs and rethrows. Callers are expected to let the error reach the top level. */
export const throwFatal: FatalHandler = (error) => {
	logger.fatal(error.message, error.stack);
	throw error;
};

/** Logs and halts the process. */
export const exitOnFatal: FatalHandler = (error) => {
	logger.fatal(error.message, error.stack);
	process.exit(1);
};
