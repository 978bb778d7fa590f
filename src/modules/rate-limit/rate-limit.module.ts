import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { CLOCK, Clock } from '../utils/clock';
import { UtilsModule } from '../utils/utils.module';
import { LayeredRateLimiter } from './layered-rate-limiter';
import {
  loadLayeredRateLimitConfig,
  loadUpstreamRateLimitConfig,
} from './rate-limit.config';
import { RateLimitGuard } from './rate-limit.guard';
import { UPSTREAM_RATE_LIMITER } from './rate-limit.interface';
import { TokenBucket } from './token-bucket';

@Module({
  imports: [ConfigModule, UtilsModule],
  providers: [
    {
      provide: UPSTREAM_RATE_LIMITER,
      inject: [ConfigService, CLOCK],
      useFactory: (configService: ConfigService, clock: Clock) => {
        const config = loadUpstreamRateLimitConfig(configService);
        new Logger('RateLimitModule').log(
          `Upstream quota: ${config.maxRequests} requests per ${config.windowMs / 1000}s`,
        );
        return new TokenBucket(config, clock);
      },
    },
    {
      provide: LayeredRateLimiter,
      inject: [ConfigService, CLOCK],
      useFactory: (configService: ConfigService, clock: Clock) =>
        new LayeredRateLimiter(loadLayeredRateLimitConfig(configService), clock),
    },
    RateLimitGuard,
  ],
  exports: [UPSTREAM_RATE_LIMITER, LayeredRateLimiter, RateLimitGuard],
})
export class RateLimitModule {}
