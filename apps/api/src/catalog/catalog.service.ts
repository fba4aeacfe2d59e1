import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  ServiceUnavailableException,
} from '@nestjs/common';
import Database from 'better-sqlite3';
import { existsSync } from 'node:fs';
import { APP_CONFIG, type AppConfig } from '../config/app-config';
import { errorMessage } from '../lib/errors';
import { isRecord } from '../lib/records';
import { resolvePosterUrl } from '../posters/poster-url';

export type CatalogMovie = Record<string, unknown> & {
  score: number | null;
  poster_url: string | null;
};

export type CatalogPage = {
  data: CatalogMovie[];
  meta: {
    current_page: number;
    limit: number;
    total_items: number;
    total_pages: number;
  };
};

function toNumberOrNull(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim()) {
    const n = Number.parseFloat(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

@Injectable()
export class CatalogService implements OnModuleDestroy {
  private readonly logger = new Logger(CatalogService.name);
  private db: Database.Database | null = null;

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  onModuleDestroy() {
    this.db?.close();
    this.db = null;
  }

  /**
   * Titles for the given ids, in the order the ids were given. A missing or
   * unreadable catalog yields an empty list.
   */
  getTitlesByIds(ids: string[]): string[] {
    if (!ids.length) return [];
    try {
      const db = this.open();
      const placeholders = ids.map(() => '?').join(', ');
      const rows = db
        .prepare(`SELECT id, title FROM movies WHERE id IN (${placeholders})`)
        .all(...ids);

      const byId = new Map<string, string>();
      for (const row of rows) {
        if (!isRecord(row)) continue;
        const title = row['title'];
        if (typeof title === 'string' && title.trim()) {
          byId.set(String(row['id']), title.trim());
        }
      }
      return ids.flatMap((id) => {
        const title = byId.get(id);
        return title ? [title] : [];
      });
    } catch (err) {
      this.logger.warn(`Title lookup failed (continuing without titles): ${errorMessage(err)}`);
      return [];
    }
  }

  listMovies(params: { page: number; limit: number }): CatalogPage {
    const page = Math.max(1, Math.trunc(params.page));
    const limit = Math.max(1, Math.min(100, Math.trunc(params.limit)));
    const offset = (page - 1) * limit;

    const db = this.open();
    const rows = db
      .prepare('SELECT * FROM movies ORDER BY vote_average DESC LIMIT ? OFFSET ?')
      .all(limit, offset);
    const countRow: unknown = db.prepare('SELECT COUNT(*) AS total FROM movies').get();
    const total = isRecord(countRow) ? (toNumberOrNull(countRow['total']) ?? 0) : 0;

    const data = rows.filter(isRecord).map((row) => this.toCatalogMovie(row));
    return {
      data,
      meta: {
        current_page: page,
        limit,
        total_items: total,
        total_pages: Math.ceil(total / limit),
      },
    };
  }

  ping(): void {
    this.open().prepare('SELECT 1').get();
  }

  private toCatalogMovie(row: Record<string, unknown>): CatalogMovie {
    const { poster_path: posterPath, ...rest } = row;
    const stored =
      typeof posterPath === 'string'
        ? posterPath
        : typeof rest['poster_url'] === 'string'
          ? rest['poster_url']
          : null;
    return {
      ...rest,
      score: 'vote_average' in row ? toNumberOrNull(row['vote_average']) : null,
      poster_url: resolvePosterUrl(stored, this.config.recommendations.imageBaseUrl),
    };
  }

  private open(): Database.Database {
    if (this.db) return this.db;
    const path = this.config.catalog.dbPath;
    if (!existsSync(path)) {
      throw new ServiceUnavailableException(`Catalog database not found at ${path}`);
    }
    this.db = new Database(path, { readonly: true, fileMustExist: true });
    this.logger.log(`Catalog database opened: ${path}`);
    return this.db;
  }
}
