import { BadRequestException, Controller, Get, Query } from '@nestjs/common';
import { ApiQuery, ApiTags } from '@nestjs/swagger';
import { isServerLogLevel, serverLogs } from './server-logs.store';

function optionalInt(raw: string | undefined): number | undefined {
  if (!raw?.trim()) return undefined;
  const n = Number.parseInt(raw, 10);
  return Number.isFinite(n) ? n : undefined;
}

@Controller('logs')
@ApiTags('logs')
export class LogsController {
  @Get()
  @ApiQuery({ name: 'afterId', required: false })
  @ApiQuery({ name: 'limit', required: false })
  @ApiQuery({ name: 'level', required: false, enum: ['debug', 'info', 'warn', 'error'] })
  getLogs(
    @Query('afterId') afterIdRaw?: string,
    @Query('limit') limitRaw?: string,
    @Query('level') levelRaw?: string,
  ) {
    const level = levelRaw?.trim().toLowerCase();
    if (level && !isServerLogLevel(level)) {
      throw new BadRequestException('level must be one of debug, info, warn, error');
    }
    const data = serverLogs.list({
      afterId: optionalInt(afterIdRaw),
      limit: optionalInt(limitRaw),
      minLevel: level && isServerLogLevel(level) ? level : undefined,
    });
    return { ok: true, ...data };
  }
}
