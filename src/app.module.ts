import { Module } from '@nestjs/common';
import { AppConfigModule } from './config/app-config.module';
import { HealthController } from './health/health.controller';
import { NormalizationModule } from './normalization/normalization.module';

@Module({
  imports: [AppConfigModule, NormalizationModule],
  controllers: [HealthController],
})
export class AppModule {}
