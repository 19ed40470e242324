/** Non-secret metadata describing a KMS backend. */
export interface KmsInfo {
	readonly endpoints: string[];
	readonly name: string;
	readonly authType: string;
}
