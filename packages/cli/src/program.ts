import { Logger } from '@nestjs/common';
import { Command } from 'commander';
import { createGenerateCommand } from './commands/generate.command.js';
import { createInfoCommand } from './commands/info.command.js';
import { createKeygenCommand } from './commands/keygen.command.js';
import { createUnsealCommand } from './commands/unseal.command.js';
import { dim } from './theme.js';

export function createProgram(): Command {
	const program = new Command();

	program
		.name('keyseal')
		.description('Generate and unseal data keys bound to a master key and a context')
		.version('0.1.0')
		.addHelpText(
			'after',
			`
${dim('Getting started:')}
  $ export KMS_MASTER_KEY=$(keyseal keygen)
  $ keyseal generate -c bucket=photos -c object=cat.jpg
  $ keyseal unseal <sealed-key> -c bucket=photos -c object=cat.jpg
`,
		);

	program.addCommand(createKeygenCommand());
	program.addCommand(createGenerateCommand());
	program.addCommand(createUnsealCommand());
	program.addCommand(createInfoCommand());

	return program;
}

export async function runCli(argv: readonly string[] = process.argv): Promise<void> {
	// Keep stdout clean for piping: only errors from the KMS layer reach the terminal.
	Logger.overrideLogger(['error', 'fatal']);
	await createProgram().parseAsync(argv);
}
