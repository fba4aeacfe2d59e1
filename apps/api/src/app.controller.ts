import { Controller, Get, Res } from '@nestjs/common';
import { ApiOkResponse, ApiTags } from '@nestjs/swagger';
import type { Response } from 'express';
import { HealthResponseDto } from './app.dto';
import { AppService } from './app.service';

@Controller()
@ApiTags('app')
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get()
  @ApiOkResponse({ type: HealthResponseDto })
  getRoot() {
    return this.appService.getHealth();
  }

  @Get('health')
  @ApiOkResponse({ type: HealthResponseDto })
  getHealth() {
    return this.appService.getHealth();
  }

  @Get('ready')
  @ApiOkResponse({
    schema: {
      example: {
        status: 'ready',
        time: '2026-01-02T00:00:00.000Z',
        checks: { catalog: { ok: true }, gemini: { ok: true }, vectorIndex: { ok: true } },
        optional: { omdb: { ok: true } },
      },
    },
  })
  getReady(@Res({ passthrough: true }) res: Response) {
    const readiness = this.appService.getReadiness();
    if (readiness.status !== 'ready') res.status(503);
    return readiness;
  }
}
