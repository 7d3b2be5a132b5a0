import { Module } from '@nestjs/common';
import { DirectoryModule } from '../directory/directory.module';
import { MetricsModule } from '../metrics/metrics.module';
import { UsageController } from './usage.controller';
import { UsageService } from './usage.service';

@Module({
  imports: [DirectoryModule, MetricsModule],
  controllers: [UsageController],
  providers: [UsageService],
})
export class UsageModule {}
