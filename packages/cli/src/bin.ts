#!/usr/bin/env tsx
import { runCli } from './program.js';

runCli().catch((error: unknown) => {
	console.error(error instanceof Error ? error.message : String(error));
	process.exit(1);
});
