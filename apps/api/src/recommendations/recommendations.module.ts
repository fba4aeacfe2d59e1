import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { GeminiModule } from '../gemini/gemini.module';
import { OmdbModule } from '../omdb/omdb.module';
import { PineconeModule } from '../pinecone/pinecone.module';
import { RankingModule } from '../ranking/ranking.module';
import { MetadataEnricherService } from './metadata-enricher.service';
import { RecommendationsController } from './recommendations.controller';
import { RecommendationsService } from './recommendations.service';

@Module({
  imports: [CatalogModule, GeminiModule, PineconeModule, RankingModule, OmdbModule],
  controllers: [RecommendationsController],
  providers: [RecommendationsService, MetadataEnricherService],
  exports: [RecommendationsService],
})
export class RecommendationsModule {}
