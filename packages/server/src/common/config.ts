function optionalEnv(name: string, fallback: string): string {
	return process.env[name] || fallback;
}

const KMS_PROVIDERS = ['master-key'] as const;
export type KmsProviderName = (typeof KMS_PROVIDERS)[number];

function isKmsProvider(value: string): value is KmsProviderName {
	return KMS_PROVIDERS.some((provider) => provider === value);
}

export interface AppConfig {
	readonly NODE_ENV: string;
	readonly PORT: number;

	// KMS
	readonly KMS_PROVIDER: KmsProviderName;
	/** `<key-id>:<hex>`; empty when the key comes from a file. */
	readonly KMS_MASTER_KEY: string;
	readonly KMS_MASTER_KEY_FILE: string;
	readonly KMS_KEY_ID: string;
}

export function parseConfig(): AppConfig {
	const portStr = process.env.PORT;
	const port = portStr ? Number.parseInt(portStr, 10) : 8080;
	if (Number.isNaN(port)) {
		throw new Error(`PORT must be a valid number, got: ${portStr}`);
	}

	const kmsProvider = optionalEnv('KMS_PROVIDER', 'master-key');
	if (!isKmsProvider(kmsProvider)) {
		throw new Error(
			`KMS_PROVIDER must be one of: ${KMS_PROVIDERS.join(', ')}. Got: ${kmsProvider}`,
		);
	}

	const masterKey = optionalEnv('KMS_MASTER_KEY', '');
	const masterKeyFile = optionalEnv('KMS_MASTER_KEY_FILE', '');

	if (kmsProvider === 'master-key') {
		if (!masterKey && !masterKeyFile) {
			throw new Error(
				'KMS_MASTER_KEY or KMS_MASTER_KEY_FILE is required when KMS_PROVIDER=master-key',
			);
		}
		if (masterKey && masterKeyFile) {
			throw new Error('Set only one of KMS_MASTER_KEY and KMS_MASTER_KEY_FILE');
		}
	}

	return {
		NODE_ENV: optionalEnv('NODE_ENV', 'development'),
		PORT: port,

		KMS_PROVIDER: kmsProvider,
		KMS_MASTER_KEY: masterKey,
		KMS_MASTER_KEY_FILE: masterKeyFile,
		KMS_KEY_ID: optionalEnv('KMS_KEY_ID', 'default'),
	};
}

export class ConfigError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'ConfigError';
	}
}

/** {@link parseConfig} with every failure reported as a {@link ConfigError}. */
export function loadConfig(): AppConfig {
	try {
		return parseConfig();
	} catch (error: unknown) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new ConfigError(`Invalid environment configuration: ${reason}`, { cause: error });
	}
}

export const APP_CONFIG = Symbol('APP_CONFIG');
