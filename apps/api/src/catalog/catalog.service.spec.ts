import Database from 'better-sqlite3';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ServiceUnavailableException } from '@nestjs/common';
import { loadAppConfig } from '../config/app-config';
import { CatalogService } from './catalog.service';

const BASE = 'https://img.example.test/w500';

function seedCatalog(path: string) {
  const db = new Database(path);
  db.exec(`
    CREATE TABLE movies (
      id TEXT PRIMARY KEY,
      title TEXT,
      overview TEXT,
      poster_path TEXT,
      vote_average REAL
    )
  `);
  const insert = db.prepare(
    'INSERT INTO movies (id, title, overview, poster_path, vote_average) VALUES (?, ?, ?, ?, ?)',
  );
  insert.run('1', 'Alien', 'In space.', '/alien.jpg', 8.5);
  insert.run('2', 'Heat', 'In LA.', 'nan', 8.3);
  insert.run('3', 'Ronin', 'In Paris.', 'https://posters.example.test/ronin.jpg', 7.2);
  insert.run('4', '  ', 'Untitled.', null, 5.0);
  db.close();
}

describe('CatalogService', () => {
  let dir: string;
  let service: CatalogService;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'screenscout-catalog-'));
    const dbPath = join(dir, 'movies.db');
    seedCatalog(dbPath);
    service = new CatalogService(
      loadAppConfig({ CATALOG_DB_PATH: dbPath, IMAGE_BASE_URL: BASE }),
    );
  });

  afterEach(() => {
    service.onModuleDestroy();
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns titles in the order the ids were given', () => {
    expect(service.getTitlesByIds(['3', 'missing', '1', '4'])).toEqual([
      'Ronin',
      'Alien',
    ]);
    expect(service.getTitlesByIds([])).toEqual([]);
  });

  it('returns no titles when the catalog file is missing', () => {
    const missing = new CatalogService(
      loadAppConfig({ CATALOG_DB_PATH: join(dir, 'nope.db') }),
    );
    expect(missing.getTitlesByIds(['1'])).toEqual([]);
    expect(() => missing.ping()).toThrow(ServiceUnavailableException);
  });

  it('pages movies by rating with resolved posters', () => {
    const page = service.listMovies({ page: 1, limit: 2 });

    expect(page.meta).toEqual({
      current_page: 1,
      limit: 2,
      total_items: 4,
      total_pages: 2,
    });
    expect(page.data).toEqual([
      {
        id: '1',
        title: 'Alien',
        overview: 'In space.',
        vote_average: 8.5,
        score: 8.5,
        poster_url: `${BASE}/alien.jpg`,
      },
      {
        id: '2',
        title: 'Heat',
        overview: 'In LA.',
        vote_average: 8.3,
        score: 8.3,
        poster_url: null,
      },
    ]);
  });

  it('keeps absolute poster urls and returns an empty page past the end', () => {
    expect(service.listMovies({ page: 2, limit: 2 }).data[0]).toMatchObject({
      id: '3',
      poster_url: 'https://posters.example.test/ronin.jpg',
    });
    expect(service.listMovies({ page: 9, limit: 2 }).data).toEqual([]);
  });

  it('pings an existing catalog', () => {
    expect(() => service.ping()).not.toThrow();
  });
});
