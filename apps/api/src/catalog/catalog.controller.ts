import {
  BadRequestException,
  Controller,
  Get,
  InternalServerErrorException,
  Logger,
  Query,
} from '@nestjs/common';
import { ApiOkResponse, ApiQuery, ApiTags } from '@nestjs/swagger';
import { errorMessage } from '../lib/errors';
import { CatalogPageDto } from './catalog.dto';
import { CatalogService } from './catalog.service';

const DEFAULT_PAGE = 1;
const DEFAULT_LIMIT = 24;
const MAX_LIMIT = 100;

function parseIntegerParam(
  name: string,
  raw: string | undefined,
  bounds: { min: number; max: number; fallback: number },
): number {
  const value = raw?.trim();
  if (!value) return bounds.fallback;
  if (!/^-?\d+$/.test(value)) {
    throw new BadRequestException(`${name} must be an integer`);
  }
  const n = Number.parseInt(value, 10);
  if (n < bounds.min || n > bounds.max) {
    throw new BadRequestException(
      `${name} must be between ${bounds.min} and ${bounds.max}`,
    );
  }
  return n;
}

@Controller('movies')
@ApiTags('catalog')
export class CatalogController {
  private readonly logger = new Logger(CatalogController.name);

  constructor(private readonly catalog: CatalogService) {}

  @Get()
  @ApiQuery({ name: 'page', required: false, example: 1 })
  @ApiQuery({ name: 'limit', required: false, example: 24 })
  @ApiOkResponse({ type: CatalogPageDto })
  listMovies(@Query('page') pageRaw?: string, @Query('limit') limitRaw?: string) {
    const page = parseIntegerParam('page', pageRaw, {
      min: 1,
      max: Number.MAX_SAFE_INTEGER,
      fallback: DEFAULT_PAGE,
    });
    const limit = parseIntegerParam('limit', limitRaw, {
      min: 1,
      max: MAX_LIMIT,
      fallback: DEFAULT_LIMIT,
    });

    try {
      return this.catalog.listMovies({ page, limit });
    } catch (err) {
      this.logger.error(`Catalog read failed: ${errorMessage(err)}`);
      throw new InternalServerErrorException('Database read error');
    }
  }
}
