import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { StatusModule } from './modules/status/status.module';
import { WeatherModule } from './modules/weather/weather.module';
import { RateLimitModule } from './modules/rate-limit/rate-limit.module';
import { UtilsModule } from './modules/utils/utils.module';
import { IndexModule } from './modules/index/index.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    ScheduleModule.forRoot(),
    UtilsModule,
    RateLimitModule,
    WeatherModule,
    StatusModule,
    IndexModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
