import { Controller, Get } from '@nestjs/common';
import {
  ApiStatus,
  CacheStatus,
  RateLimitStatus,
  StatusService,
} from './status.service';

@Controller('status')
export class StatusController {
  constructor(private readonly statusService: StatusService) {}

  @Get()
  getStatus(): ApiStatus {
    return this.statusService.getStatus();
  }

  @Get('cache')
  getCacheStats(): CacheStatus {
    return this.statusService.getCacheStats();
  }

  @Get('rate-limit')
  getRateLimitStats(): RateLimitStatus {
    return this.statusService.getRateLimitStats();
  }
}
