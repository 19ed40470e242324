export { AppModule } from './app.module.js';
export { APP_CONFIG, ConfigError, loadConfig, parseConfig } from './common/config.js';
export type { AppConfig, KmsProviderName } from './common/config.js';
export { KMS_PROVIDER, KmsModule, createKmsProvider } from './common/kms.module.js';
export { GlobalExceptionFilter } from './common/global-exception.filter.js';
