import { Module } from '@nestjs/common';
import { KmsController } from './kms.controller.js';

@Module({
	controllers: [KmsController],
})
export class KmsApiModule {}
