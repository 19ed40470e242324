import type { Context } from '@keyseal/core';
import { hasAmbiguousCharacters } from '@keyseal/kms';
import { warnMark } from '../theme.js';

export function warnIfAmbiguous(context: Context): void {
	if (hasAmbiguousCharacters(context)) {
		console.error(
			`  ${warnMark('Context contains " or \\ which are not escaped; a different context may derive the same key.')}`,
		);
	}
}
