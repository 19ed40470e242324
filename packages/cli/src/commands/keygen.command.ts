import { generateMasterKey } from '@keyseal/kms';
import { Command } from 'commander';
import { failMark } from '../theme.js';

export function createKeygenCommand(): Command {
	return new Command('keygen')
		.description('Generate a new random master key as <key-id>:<hex>')
		.option('--key-id <id>', 'Key ID to prefix the master key with', 'default')
		.action((options: { keyId: string }) => {
			try {
				console.log(generateMasterKey(options.keyId));
			} catch (error: unknown) {
				const message = error instanceof Error ? error.message : 'Unknown error';
				console.error(`\n  ${failMark(message)}\n`);
				process.exitCode = 1;
			}
		});
}
