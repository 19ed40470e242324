export { createProgram, runCli } from './program.js';
export { parseContextPairs } from './context-args.js';
export { resolveMasterKey } from './master-key-source.js';
export type { MasterKeyOptions } from './master-key-source.js';
