import type { IKmsProvider } from '@keyseal/core';
import { Controller, Get, Inject, Res } from '@nestjs/common';
import type { Response } from 'express';
import { KMS_PROVIDER } from './common/kms.module.js';

@Controller('health')
export class HealthController {
	constructor(@Inject(KMS_PROVIDER) private readonly kms: IKmsProvider) {}

	@Get()
	async check(@Res() res: Response) {
		const kmsOk = await this.kms.healthCheck().catch(() => false);

		res.status(kmsOk ? 200 : 503).json({
			status: kmsOk ? 'ok' : 'degraded',
			uptime: Math.floor(process.uptime()),
			kms: {
				provider: this.kms.name,
				healthy: kmsOk,
			},
			timestamp: new Date().toISOString(),
		});
	}
}
