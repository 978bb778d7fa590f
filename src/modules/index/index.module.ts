import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { IndexController } from './index.controller';
import { UtilsModule } from '../utils/utils.module';
import { StatusModule } from '../status/status.module';

@Module({
  imports: [ConfigModule, UtilsModule, StatusModule],
  controllers: [IndexController],
})
export class IndexModule {}
