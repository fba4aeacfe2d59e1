import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { CatalogModule } from './catalog/catalog.module';
import { ConfigModule } from './config/config.module';
import { GeminiModule } from './gemini/gemini.module';
import { LogsModule } from './logs/logs.module';
import { OmdbModule } from './omdb/omdb.module';
import { PineconeModule } from './pinecone/pinecone.module';
import { RecommendationsModule } from './recommendations/recommendations.module';

@Module({
  imports: [
    ConfigModule,
    LogsModule,
    CatalogModule,
    GeminiModule,
    PineconeModule,
    OmdbModule,
    RecommendationsModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
