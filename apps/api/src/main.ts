import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { Logger } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';
import { AppModule } from './app.module';
import { ensureBootstrapEnv } from './bootstrap-env';
import { BufferedLogger } from './logs/buffered-logger';
import { readAppMeta } from './app.meta';
import { API_DOCS_PATH, HTTP_SLOW_REQUEST_THRESHOLD_MS } from './app.constants';
import { APP_CONFIG, type AppConfig } from './config/app-config';
import { isRecord } from './lib/records';

async function bootstrap() {
  const fromFiles = ensureBootstrapEnv();
  const bootstrapLogger = new Logger('Bootstrap');

  process.on('unhandledRejection', (reason) => {
    bootstrapLogger.error(`Unhandled rejection: ${String(reason)}`);
  });
  process.on('uncaughtException', (err) => {
    bootstrapLogger.error(`Uncaught exception: ${err?.stack ?? String(err)}`);
    process.exit(1);
  });

  const app = await NestFactory.create(AppModule, {
    logger: new BufferedLogger(),
  });
  const config = app.get<AppConfig>(APP_CONFIG);

  if (fromFiles.length > 0) {
    bootstrapLogger.log(`Loaded secrets from files: ${fromFiles.join(', ')}`);
  }

  // No allowlist means any origin may call the API.
  const corsOrigins = config.http.corsOrigins;
  app.enableCors({
    origin: corsOrigins.length > 0 ? corsOrigins : true,
    credentials: true,
  });

  // Lightweight request logging (only warnings/errors/slow requests)
  if (config.http.requestLogging) {
    const httpLogger = new Logger('HTTP');
    app.use((req: Request, res: Response, next: NextFunction) => {
      const start = process.hrtime.bigint();
      res.on('finish', () => {
        const ms = Number(process.hrtime.bigint() - start) / 1e6;
        const status = res.statusCode;
        const path = req.originalUrl || req.url;
        const msg = `${req.method} ${path} -> ${status} ${ms.toFixed(0)}ms`;

        if (status >= 500) httpLogger.error(msg);
        else if (status >= 400) httpLogger.warn(msg);
        else if (ms >= HTTP_SLOW_REQUEST_THRESHOLD_MS)
          httpLogger.warn(`SLOW ${msg}`);
      });
      next();
    });
  }

  if (config.http.swaggerEnabled) {
    const meta = readAppMeta();
    const document = SwaggerModule.createDocument(
      app,
      new DocumentBuilder()
        .setTitle('ScreenScout API')
        .setDescription('Movie recommendations from a free-text request and liked titles.')
        .setVersion(meta.version)
        .build(),
    );
    SwaggerModule.setup(API_DOCS_PATH, app, document);
  }

  const { port, host } = config.http;
  try {
    await app.listen(port, host);
  } catch (err) {
    if (isRecord(err) && err.code === 'EADDRINUSE') {
      bootstrapLogger.error(
        `Port ${port} is already in use. Stop the other process or set PORT to a free port.`,
      );
      process.exit(1);
    }
    throw err;
  }

  const url = await app.getUrl().catch(() => `http://${host}:${port}`);
  bootstrapLogger.log(
    `API listening: ${url} (catalog=${config.catalog.dbPath}, K=${config.recommendations.topK}, C=${config.recommendations.contextSize}, R=${config.recommendations.resultCount})`,
  );
}
void bootstrap().catch((err) => {
  const logger = new Logger('Bootstrap');
  logger.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
  process.exit(1);
});
