import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { UsageService } from './usage.service';

type UsageRequestBody = {
  kennitala?: unknown;
};

@Controller()
export class UsageController {
  constructor(private readonly usageService: UsageService) {}

  @Post('get-usage-data')
  @HttpCode(200)
  getUsageData(@Body() body: UsageRequestBody) {
    return this.usageService.getUsageData(body);
  }
}
