import { type MasterKeySpec, MasterKeyKms, exitOnFatal, loadMasterKeyFile, parseMasterKey } from '@keyseal/kms';
import { Option } from 'commander';

export interface MasterKeyOptions {
	readonly masterKey?: string;
	readonly masterKeyFile?: string;
	readonly keyId?: string;
}

export const masterKeyOption = new Option(
	'-m, --master-key <key>',
	'Master key as <key-id>:<hex> (default: $KMS_MASTER_KEY)',
);
export const masterKeyFileOption = new Option(
	'-f, --master-key-file <path>',
	'File holding a hex master key',
).conflicts('masterKey');
export const keyIdOption = new Option('--key-id <id>', 'Key ID for --master-key-file').default(
	'default',
);

export function resolveMasterKey(options: MasterKeyOptions): MasterKeySpec {
	if (options.masterKeyFile) {
		return loadMasterKeyFile(options.masterKeyFile, options.keyId ?? 'default');
	}
	const value = options.masterKey ?? process.env.KMS_MASTER_KEY;
	if (!value) {
		throw new Error('No master key. Pass --master-key, --master-key-file or set KMS_MASTER_KEY.');
	}
	return parseMasterKey(value);
}

export function openKms(options: MasterKeyOptions): MasterKeyKms {
	const { keyId, masterKey } = resolveMasterKey(options);
	try {
		return new MasterKeyKms({ keyId, masterKey, onFatal: exitOnFatal });
	} finally {
		masterKey.fill(0);
	}
}
