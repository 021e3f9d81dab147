import { Module } from '@nestjs/common';
import { ConversionModule } from './webhook/conversion.module.js';
import { HealthModule } from './health/health.module.js';

@Module({
  imports: [HealthModule, ConversionModule],
})
// eslint-disable-next-line @typescript-eslint/no-extraneous-class
export class AppModule {}
