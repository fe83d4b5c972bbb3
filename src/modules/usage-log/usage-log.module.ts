import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { UsageLogEntry } from './entities/usage-log-entry.entity';
import { UsageLogService } from './usage-log.service';

@Module({
  imports: [TypeOrmModule.forFeature([UsageLogEntry])],
  providers: [UsageLogService],
  exports: [UsageLogService],
})
export class UsageLogModule {}
