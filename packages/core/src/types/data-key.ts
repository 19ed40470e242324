export interface GeneratedDataKey {
	readonly plaintextKey: Uint8Array; // 32 bytes — use then wipe
	readonly sealedKey: Uint8Array; // persist alongside the ciphertext
	readonly keyId: string; // master key the sealed key belongs to
}
