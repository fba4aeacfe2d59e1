import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module';
import { ensureBootstrapEnv } from '../bootstrap-env';
import { parseRecommendBody } from '../recommendations/recommendations.controller';
import { RecommendationsService } from '../recommendations/recommendations.service';

/**
 * Usage: recommend-once "<query>" [--ids id1,id2,...]
 */
export function parseArgs(argv: string[]): {
  query: string;
  selected_movie_ids: string[];
} {
  const words: string[] = [];
  let ids: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === '--ids') {
      ids = (argv[i + 1] ?? '')
        .split(',')
        .map((v) => v.trim())
        .filter(Boolean);
      i += 1;
      continue;
    }
    if (arg.startsWith('--ids=')) {
      ids = arg
        .slice('--ids='.length)
        .split(',')
        .map((v) => v.trim())
        .filter(Boolean);
      continue;
    }
    words.push(arg);
  }
  return { query: words.join(' '), selected_movie_ids: ids };
}

async function main() {
  ensureBootstrapEnv();
  const request = parseRecommendBody(parseArgs(process.argv.slice(2)));

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn'],
  });
  try {
    const result = await app.get(RecommendationsService).recommend(request);
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(result, null, 2));
    if ('error' in result) process.exitCode = 1;
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  void main().catch((err) => {
    new Logger('RecommendOnce').error(
      err instanceof Error ? (err.stack ?? err.message) : String(err),
    );
    process.exit(1);
  });
}
