import { Injectable, Logger } from '@nestjs/common';
import { Interval } from '@nestjs/schedule';
import { serverLogs } from './server-logs.store';

const RETENTION_MS = 7 * 24 * 60 * 60_000;
const SWEEP_INTERVAL_MS = 60 * 60_000;

@Injectable()
export class LogsRetentionService {
  private readonly logger = new Logger(LogsRetentionService.name);

  @Interval(SWEEP_INTERVAL_MS)
  sweep() {
    const cutoff = new Date(Date.now() - RETENTION_MS);
    const { removed, kept } = serverLogs.pruneOlderThan(cutoff);
    if (removed > 0) {
      this.logger.log(`Log retention: removed=${removed} kept=${kept}`);
    }
  }
}
