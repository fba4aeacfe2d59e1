import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class RecommendRequestDto {
  @ApiProperty({ example: 'Mind bending sci-fi movies' })
  query!: string;

  @ApiPropertyOptional({ type: [String], example: ['27205'], default: [] })
  selected_movie_ids?: string[];
}

export class MovieResultDto {
  @ApiProperty({ example: '157336' })
  id!: string;

  @ApiProperty({ example: 'Interstellar' })
  title!: string;

  @ApiProperty({ example: 'The adventures of a group of explorers…' })
  overview!: string;

  @ApiProperty({
    example: 'https://image.tmdb.org/t/p/w500/gEU2QniE6E77NI6lCU6MxlNBvIx.jpg',
    nullable: true,
  })
  poster_url!: string | null;

  @ApiProperty({ example: 0.83, description: 'Similarity from the vector index' })
  score!: number;

  @ApiProperty({ example: '2014', nullable: true })
  year!: string | null;

  @ApiProperty({ example: '8.7', nullable: true })
  imdb_rating!: string | null;

  @ApiProperty({ example: 'Shares the layered, time-bending plotting you asked for.' })
  reasoning!: string;
}

export class RecommendResponseDto {
  @ApiProperty({
    example: 'Here are the most relevant movies from our database.',
    nullable: true,
  })
  ai_reasoning!: string | null;

  @ApiProperty({ type: [MovieResultDto] })
  movies!: MovieResultDto[];

  @ApiPropertyOptional({
    example: 'Embedding failed: GEMINI_KEY is not configured',
    description: 'Present instead of ai_reasoning when retrieval failed',
  })
  error?: string;
}
