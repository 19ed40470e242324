export type { Context } from './context.js';
export type { GeneratedDataKey } from './data-key.js';
export type { KmsInfo } from './kms-info.js';
