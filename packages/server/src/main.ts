import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module.js';
import { APP_CONFIG, type AppConfig } from './common/config.js';

async function bootstrap() {
	const app = await NestFactory.create<NestExpressApplication>(AppModule);
	const logger = new Logger('Bootstrap');

	const config = app.get<AppConfig>(APP_CONFIG);

	app.enableShutdownHooks();
	app.setGlobalPrefix('api/v1');
	await app.listen(config.PORT);
	logger.log(`Server running on port ${config.PORT} [kms=${config.KMS_PROVIDER}]`);
}

bootstrap().catch((error: unknown) => {
	new Logger('Bootstrap').fatal(error instanceof Error ? error.message : String(error));
	process.exit(1);
});
