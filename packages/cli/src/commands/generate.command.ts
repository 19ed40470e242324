import { encodeContext } from '@keyseal/kms';
import { Command } from 'commander';
import { collectPair, parseContextPairs } from '../context-args.js';
import { bytesToBase64, bytesToHex } from '../encoding.js';
import {
	type MasterKeyOptions,
	keyIdOption,
	masterKeyFileOption,
	masterKeyOption,
	openKms,
} from '../master-key-source.js';
import { failMark, printRows } from '../theme.js';
import { warnIfAmbiguous } from './context-warning.js';

interface GenerateOptions extends MasterKeyOptions {
	readonly context: string[];
	readonly json?: boolean;
}

export function createGenerateCommand(): Command {
	return new Command('generate')
		.description('Generate a data key and print it with its sealed form')
		.argument('[key-id]', 'Key ID to seal under (default: the master key ID)')
		.option('-c, --context <key=value>', 'Context entry bound to the key (repeatable)', collectPair, [])
		.option('--json', 'Print JSON instead of a table')
		.addOption(masterKeyOption)
		.addOption(masterKeyFileOption)
		.addOption(keyIdOption)
		.action(async (keyIdArg: string | undefined, options: GenerateOptions) => {
			try {
				const context = parseContextPairs(options.context);
				warnIfAmbiguous(context);

				const kms = openKms(options);
				try {
					const keyId = keyIdArg ?? kms.defaultKeyId();
					const { plaintextKey, sealedKey } = await kms.generateKey(keyId, context);
					const plaintextHex = bytesToHex(plaintextKey);
					plaintextKey.fill(0);

					if (options.json) {
						console.log(
							JSON.stringify({ keyId, plaintextKey: plaintextHex, sealedKey: bytesToBase64(sealedKey) }),
						);
						return;
					}

					console.log('');
					printRows([
						['Key ID', keyId],
						['Context', encodeContext(context)],
						['Plaintext', plaintextHex],
						['Sealed key', bytesToBase64(sealedKey)],
					]);
					console.log('');
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
