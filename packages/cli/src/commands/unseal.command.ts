import { Command } from 'commander';
import { collectPair, parseContextPairs } from '../context-args.js';
import { base64ToBytes, bytesToHex } from '../encoding.js';
import {
	type MasterKeyOptions,
	keyIdOption,
	masterKeyFileOption,
	masterKeyOption,
	openKms,
} from '../master-key-source.js';
import { failMark } from '../theme.js';
import { warnIfAmbiguous } from './context-warning.js';

interface UnsealOptions extends MasterKeyOptions {
	readonly context: string[];
	readonly json?: boolean;
}

export function createUnsealCommand(): Command {
	return new Command('unseal')
		.description('Recover a data key from its sealed form')
		.argument('<sealed-key>', 'Sealed key (base64)')
		.argument('[key-id]', 'Key ID it was sealed under (default: the master key ID)')
		.option('-c, --context <key=value>', 'Context entry used at generation (repeatable)', collectPair, [])
		.option('--json', 'Print JSON instead of plain hex')
		.addOption(masterKeyOption)
		.addOption(masterKeyFileOption)
		.addOption(keyIdOption)
		.action(async (sealed: string, keyIdArg: string | undefined, options: UnsealOptions) => {
			try {
				const context = parseContextPairs(options.context);
				warnIfAmbiguous(context);
				const sealedKey = base64ToBytes(sealed);

				const kms = openKms(options);
				try {
					const keyId = keyIdArg ?? kms.defaultKeyId();
					const plaintextKey = await kms.unsealKey(keyId, sealedKey, context);
					const plaintextHex = bytesToHex(plaintextKey);
					plaintextKey.fill(0);

					console.log(options.json ? JSON.stringify({ keyId, plaintextKey: plaintextHex }) : plaintextHex);
				} finally {
					await kms.destroy();
				}
			} catch (error: unknown) {
				const message = error instanceof Error ? error.message : 'Unknown error';
				console.error(`\n  ${failMark(message)}\n`);
				process.exitCode = 1;
			}
		});
}
