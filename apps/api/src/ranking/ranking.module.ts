import { Module } from '@nestjs/common';
import { GeminiModule } from '../gemini/gemini.module';
import { RankingService } from './ranking.service';

@Module({
  imports: [GeminiModule],
  providers: [RankingService],
  exports: [RankingService],
})
export class RankingModule {}
