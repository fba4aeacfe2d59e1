import {
  BadRequestException,
  InternalServerErrorException,
} from '@nestjs/common';
import { CatalogController } from './catalog.controller';

describe('CatalogController', () => {
  const catalog = { listMovies: jest.fn() };
  let controller: CatalogController;

  beforeEach(() => {
    catalog.listMovies.mockReset().mockReturnValue({ data: [], meta: {} });
    controller = new CatalogController(catalog as never);
  });

  it('defaults to page 1 with 24 movies', () => {
    controller.listMovies();
    expect(catalog.listMovies).toHaveBeenCalledWith({ page: 1, limit: 24 });
  });

  it('passes explicit paging through', () => {
    controller.listMovies('3', '100');
    expect(catalog.listMovies).toHaveBeenCalledWith({ page: 3, limit: 100 });
  });

  it.each([
    ['0', undefined],
    ['abc', undefined],
    [undefined, '101'],
    [undefined, '2.5'],
  ])('rejects page=%s limit=%s', (page, limit) => {
    expect(() => controller.listMovies(page, limit)).toThrow(BadRequestException);
    expect(catalog.listMovies).not.toHaveBeenCalled();
  });

  it('maps read failures to a 500', () => {
    catalog.listMovies.mockImplementation(() => {
      throw new Error('SQLITE_CORRUPT');
    });
    expect(() => controller.listMovies()).toThrow(
      new InternalServerErrorException('Database read error'),
    );
  });
});
