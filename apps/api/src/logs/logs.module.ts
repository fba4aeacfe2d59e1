import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { LogsController } from './logs.controller';
import { LogsRetentionService } from './logs-retention.service';

@Module({
  imports: [ScheduleModule.forRoot()],
  controllers: [LogsController],
  providers: [LogsRetentionService],
})
export class LogsModule {}
