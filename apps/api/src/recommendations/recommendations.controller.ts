import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  Inject,
  Post,
  Res,
} from '@nestjs/common';
import { ApiBody, ApiOkResponse, ApiTags } from '@nestjs/swagger';
import type { Response } from 'express';
import { APP_CONFIG, type AppConfig } from '../config/app-config';
import { RecommendRequestDto, RecommendResponseDto } from './recommendations.dto';
import { RecommendationsService } from './recommendations.service';
import type { RecommendationRequest } from './recommendations.types';

type RecommendBody = {
  query?: unknown;
  selected_movie_ids?: unknown;
};

export function parseRecommendBody(body: RecommendBody | undefined): RecommendationRequest {
  const query = body?.query;
  if (typeof query !== 'string') {
    throw new BadRequestException('query must be a string');
  }

  const rawIds = body?.selected_movie_ids ?? [];
  if (!Array.isArray(rawIds)) {
    throw new BadRequestException('selected_movie_ids must be an array');
  }

  const selectedIds: string[] = [];
  for (const raw of rawIds) {
    const id =
      typeof raw === 'string'
        ? raw
        : typeof raw === 'number' && Number.isFinite(raw)
          ? String(raw)
          : null;
    if (id === null) {
      throw new BadRequestException('selected_movie_ids must contain strings');
    }
    if (id && !selectedIds.includes(id)) selectedIds.push(id);
  }

  return { query, selectedIds };
}

@Controller()
@ApiTags('recommendations')
export class RecommendationsController {
  constructor(
    private readonly recommendations: RecommendationsService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  @Post('recommend')
  @HttpCode(200)
  @ApiBody({ type: RecommendRequestDto })
  @ApiOkResponse({ type: RecommendResponseDto })
  async recommend(
    @Body() body: RecommendBody,
    @Res({ passthrough: true }) res: Response,
  ) {
    const request = parseRecommendBody(body);

    if (!this.config.recommendations.cancelEnrichmentOnDisconnect) {
      return this.recommendations.recommend(request);
    }

    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableFinished) controller.abort();
    };
    res.on('close', onClose);
    try {
      return await this.recommendations.recommend(request, {
        signal: controller.signal,
      });
    } finally {
      res.off('close', onClose);
    }
  }
}
