import { Module } from '@nestjs/common';
import { StatusController } from './status.controller';
import { StatusService } from './status.service';
import { RateLimitModule } from '../rate-limit/rate-limit.module';
import { WeatherModule } from '../weather/weather.module';

@Module({
  imports: [RateLimitModule, WeatherModule],
  controllers: [StatusController],
  providers: [StatusService],
  exports: [StatusService],
})
export class StatusModule {}
