import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { ClockModule } from './common/clock.module';
import { UsageModule } from './usage/usage.module';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true }), ClockModule, UsageModule],
  controllers: [AppController],
})
export class AppModule {}
