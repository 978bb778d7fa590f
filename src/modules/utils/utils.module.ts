import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CLOCK, systemClock } from './clock';
import { ReadmeService } from './readme.service';
import { CacheControlInterceptor } from './cache-control.interceptor';
import { ApiExceptionFilter } from './api-exception.filter';

@Module({
  imports: [ConfigModule],
  providers: [
    { provide: CLOCK, useValue: systemClock },
    ReadmeService,
    CacheControlInterceptor,
    ApiExceptionFilter,
  ],
  exports: [CLOCK, ReadmeService, CacheControlInterceptor, ApiExceptionFilter],
})
export class UtilsModule {}
