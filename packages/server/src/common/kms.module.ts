import type { IKmsProvider } from '@keyseal/core';
import {
	type MasterKeySpec,
	MasterKeyKms,
	exitOnFatal,
	loadMasterKeyFile,
	parseMasterKey,
} from '@keyseal/kms';
import { Global, Inject, Module, type OnModuleDestroy } from '@nestjs/common';
import { APP_CONFIG, type AppConfig } from './config.js';

export const KMS_PROVIDER = Symbol('KMS_PROVIDER');

function resolveMasterKey(config: AppConfig): MasterKeySpec {
	if (config.KMS_MASTER_KEY) {
		return parseMasterKey(config.KMS_MASTER_KEY);
	}
	return loadMasterKeyFile(config.KMS_MASTER_KEY_FILE, config.KMS_KEY_ID);
}

export function createKmsProvider(config: AppConfig): IKmsProvider {
	switch (config.KMS_PROVIDER) {
		case 'master-key': {
			const { keyId, masterKey } = resolveMasterKey(config);
			try {
				return new MasterKeyKms({ keyId, masterKey, onFatal: exitOnFatal });
			} finally {
				masterKey.fill(0);
			}
		}
		default:
			throw new Error(`Unknown KMS provider: ${config.KMS_PROVIDER}`);
	}
}

@Global()
@Module({
	providers: [
		{
			provide: KMS_PROVIDER,
			useFactory: (config: AppConfig) => createKmsProvider(config),
			inject: [APP_CONFIG],
		},
	],
	exports: [KMS_PROVIDER],
})
export class KmsModule implements OnModuleDestroy {
	constructor(@Inject(KMS_PROVIDER) private readonly kms: IKmsProvider) {}

	async onModuleDestroy() {
		await this.kms.destroy();
	}
}
