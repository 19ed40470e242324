export type { IKmsProvider } from './kms-provider.interface.js';
