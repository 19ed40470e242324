import { Command } from 'commander';
import {
	type MasterKeyOptions,
	keyIdOption,
	masterKeyFileOption,
	masterKeyOption,
	openKms,
} from '../master-key-source.js';
import { bold, dim, failMark, printRows } from '../theme.js';

export function createInfoCommand(): Command {
	return new Command('info')
		.description('Describe the KMS configured by the master key')
		.addOption(masterKeyOption)
		.addOption(masterKeyFileOption)
		.addOption(keyIdOption)
		.action(async (options: MasterKeyOptions) => {
			try {
				const kms = openKms(options);
				try {
					const info = kms.info();
					console.log('');
					console.log(`  ${bold(kms.name)}`);
					console.log('');
					printRows([
						['Default key ID', kms.defaultKeyId()],
						['Auth type', info.authType],
						['Name', info.name || dim('--')],
						['Endpoints', info.endpoints.length > 0 ? info.endpoints.join(', ') : dim('--')],
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
