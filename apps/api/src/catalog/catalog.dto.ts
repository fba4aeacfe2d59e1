import { ApiProperty } from '@nestjs/swagger';

export class CatalogMovieDto {
  @ApiProperty({ example: '27205' })
  id!: string;

  @ApiProperty({ example: 'Inception' })
  title!: string;

  @ApiProperty({ example: 'A thief who steals corporate secrets…' })
  overview!: string;

  @ApiProperty({ example: 8.1, nullable: true })
  score!: number | null;

  @ApiProperty({
    example: 'https://image.tmdb.org/t/p/w500/edv5CZvWj09upOsy2Y6IwDhK8bt.jpg',
    nullable: true,
  })
  poster_url!: string | null;
}

export class CatalogPageMetaDto {
  @ApiProperty({ example: 1 })
  current_page!: number;

  @ApiProperty({ example: 24 })
  limit!: number;

  @ApiProperty({ example: 4800 })
  total_items!: number;

  @ApiProperty({ example: 200 })
  total_pages!: number;
}

export class CatalogPageDto {
  @ApiProperty({ type: [CatalogMovieDto] })
  data!: CatalogMovieDto[];

  @ApiProperty({ type: CatalogPageMetaDto })
  meta!: CatalogPageMetaDto;
}
