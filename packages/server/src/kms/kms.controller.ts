import type { IKmsProvider } from '@keyseal/core';
import { Controller, Get, HttpCode, HttpStatus, Inject, Logger, Param, Post } from '@nestjs/common';
import { KMS_PROVIDER } from '../common/kms.module.js';

/**
 * Describes the configured KMS. Data keys are never handed out over HTTP;
 * callers embed a provider in-process for that.
 */
@Controller('kms')
export class KmsController {
	private readonly logger = new Logger(KmsController.name);

	constructor(@Inject(KMS_PROVIDER) private readonly kms: IKmsProvider) {}

	@Get('info')
	info() {
		const { endpoints, name, authType } = this.kms.info();
		return {
			defaultKeyId: this.kms.defaultKeyId(),
			endpoints,
			name,
			authType,
		};
	}

	@Post('keys/:keyId')
	@HttpCode(HttpStatus.CREATED)
	async createKey(@Param('keyId') keyId: string) {
		await this.kms.createKey(keyId);
		this.logger.log(`Created master key ${keyId} [kms=${this.kms.name}]`);
		return { keyId };
	}
}
