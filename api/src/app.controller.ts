import { Controller, Get, Inject } from '@nestjs/common';
import { CLOCK } from './common/clock';
import type { Clock } from './common/clock';

export const SERVICE_NAME = 'Icelandic SSN Usage API';
export const SERVICE_VERSION = '1.0.0';

@Controller()
export class AppController {
  constructor(@Inject(CLOCK) private readonly clock: Clock) {}

  @Get()
  banner() {
    return { message: SERVICE_NAME, version: SERVICE_VERSION };
  }

  @Get('health')
  health() {
    return { status: 'healthy', timestamp: this.clock.now().toISOString() };
  }
}
