import { Global, Module } from '@nestjs/common';
import { APP_CONFIG, loadConfig } from './config.js';

/** Reads the environment once at boot; a bad value stops the app before any key is loaded. */
@Global()
@Module({
	providers: [{ provide: APP_CONFIG, useFactory: loadConfig }],
	exports: [APP_CONFIG],
})
export class ConfigModule {}
