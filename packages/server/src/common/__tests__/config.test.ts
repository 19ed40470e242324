import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigError, loadConfig, parseConfig } from '../config.js';

const MASTER_KEY = `default:${'00'.repeat(32)}`;

describe('parseConfig', () => {
	beforeEach(() => {
		vi.stubEnv('NODE_ENV', '');
		vi.stubEnv('PORT', '');
		vi.stubEnv('KMS_PROVIDER', '');
		vi.stubEnv('KMS_MASTER_KEY', '');
		vi.stubEnv('KMS_MASTER_KEY_FILE', '');
		vi.stubEnv('KMS_KEY_ID', '');
	});

	afterEach(() => {
		vi.unstubAllEnvs();
	});

	it('applies defaults around an inline master key', () => {
		vi.stubEnv('KMS_MASTER_KEY', MASTER_KEY);

		expect(parseConfig()).toEqual({
			NODE_ENV: 'development',
			PORT: 8080,
			KMS_PROVIDER: 'master-key',
			KMS_MASTER_KEY: MASTER_KEY,
			KMS_MASTER_KEY_FILE: '',
			KMS_KEY_ID: 'default',
		});
	});

	it('accepts a key file with a custom key ID', () => {
		vi.stubEnv('KMS_MASTER_KEY_FILE', '/run/secrets/master.key');
		vi.stubEnv('KMS_KEY_ID', 'objects');
		vi.stubEnv('PORT', '9000');

		const config = parseConfig();

		expect(config.KMS_MASTER_KEY_FILE).toBe('/run/secrets/master.key');
		expect(config.KMS_KEY_ID).toBe('objects');
		expect(config.PORT).toBe(9000);
	});

	it('requires a master key source', () => {
		expect(() => parseConfig()).toThrow(
			'KMS_MASTER_KEY or KMS_MASTER_KEY_FILE is required when KMS_PROVIDER=master-key',
		);
	});

	it('rejects both master key sources at once', () => {
		vi.stubEnv('KMS_MASTER_KEY', MASTER_KEY);
		vi.stubEnv('KMS_MASTER_KEY_FILE', '/run/secrets/master.key');

		expect(() => parseConfig()).toThrow('Set only one of KMS_MASTER_KEY and KMS_MASTER_KEY_FILE');
	});

	it('rejects an unknown provider', () => {
		vi.stubEnv('KMS_PROVIDER', 'aws');
		vi.stubEnv('KMS_MASTER_KEY', MASTER_KEY);

		expect(() => parseConfig()).toThrow('KMS_PROVIDER must be one of: master-key. Got: aws');
	});

	it('rejects a non-numeric port', () => {
		vi.stubEnv('PORT', 'eighty');
		vi.stubEnv('KMS_MASTER_KEY', MASTER_KEY);

		expect(() => parseConfig()).toThrow('PORT must be a valid number, got: eighty');
	});
});

describe('loadConfig', () => {
	afterEach(() => {
		vi.unstubAllEnvs();
	});

	it('returns the parsed configuration', () => {
		vi.stubEnv('KMS_PROVIDER', '');
		vi.stubEnv('KMS_MASTER_KEY', MASTER_KEY);
		vi.stubEnv('KMS_MASTER_KEY_FILE', '');
		vi.stubEnv('PORT', '9100');

		expect(loadConfig().PORT).toBe(9100);
	});

	it('reports a bad environment as a ConfigError with the cause attached', () => {
		vi.stubEnv('KMS_PROVIDER', '');
		vi.stubEnv('KMS_MASTER_KEY', MASTER_KEY);
		vi.stubEnv('KMS_MASTER_KEY_FILE', '');
		vi.stubEnv('PORT', 'eighty');

		const error = (() => {
			try {
				loadConfig();
			} catch (caught: unknown) {
				return caught;
			}
			return undefined;
		})();

		expect(error).toBeInstanceOf(ConfigError);
		expect(String(error)).toBe(
			'ConfigError: Invalid environment configuration: PORT must be a valid number, got: eighty',
		);
		expect(error).toHaveProperty('cause.message', 'PORT must be a valid number, got: eighty');
	});
});
