import { Module } from '@nestjs/common';
import { MetricsQueryClient } from './metrics-query.client';

@Module({
  providers: [MetricsQueryClient],
  exports: [MetricsQueryClient],
})
export class MetricsModule {}
