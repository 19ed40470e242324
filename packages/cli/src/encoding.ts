const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function bytesToHex(bytes: Uint8Array): string {
	return Buffer.from(bytes).toString('hex');
}

export function bytesToBase64(bytes: Uint8Array): string {
	return Buffer.from(bytes).toString('base64');
}

/** Strict decode: Buffer.from silently skips invalid characters, this does not. */
export function base64ToBytes(base64: string): Uint8Array {
	const clean = base64.trim();
	if (!BASE64_PATTERN.test(clean)) {
		throw new Error('Sealed key must be standard base64');
	}
	return new Uint8Array(Buffer.from(clean, 'base64'));
}
