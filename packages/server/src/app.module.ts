import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule } from './common/config.module.js';
import { GlobalExceptionFilter } from './common/global-exception.filter.js';
import { KmsModule } from './common/kms.module.js';
import { HealthController } from './health.controller.js';
import { KmsApiModule } from './kms/kms-api.module.js';

@Module({
	imports: [ConfigModule, KmsModule, KmsApiModule],
	controllers: [HealthController],
	providers: [
		{
			provide: APP_FILTER,
			useClass: GlobalExceptionFilter,
		},
	],
})
export class AppModule {}
