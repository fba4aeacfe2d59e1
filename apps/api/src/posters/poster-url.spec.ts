import { pickPosterReference, resolvePosterUrl } from './poster-url';

describe('resolvePosterUrl', () => {
  const base = 'https://image.tmdb.org/t/p/w500';

  it.each([
    ['/path/to/poster.jpg', `${base}/path/to/poster.jpg`],
    ['another/path.jpg', `${base}/another/path.jpg`],
    [
      'https://m.media-amazon.com/images/M/photo.jpg',
      'https://m.media-amazon.com/images/M/photo.jpg',
    ],
    ['https://s3.bucket/movie.png', 'https://s3.bucket/movie.png'],
    ['  /padded.jpg  ', `${base}/padded.jpg`],
  ])('resolves %s', (raw, expected) => {
    expect(resolvePosterUrl(raw, base)).toBe(expected);
  });

  it.each([['NaN'], ['nan'], ['NAN'], [''], ['   '], [null], [undefined]])(
    'returns null for %p',
    (raw) => {
      expect(resolvePosterUrl(raw, base)).toBeNull();
    },
  );

  it('drops a trailing slash from the configured base', () => {
    expect(resolvePosterUrl('/a/b.jpg', 'https://img.example/w342/')).toBe(
      'https://img.example/w342/a/b.jpg',
    );
    expect(resolvePosterUrl('a/b.jpg', 'https://img.example/w342/')).toBe(
      'https://img.example/w342/a/b.jpg',
    );
  });

  it('defaults to the TMDb image base', () => {
    expect(resolvePosterUrl('/x.jpg')).toBe(`${base}/x.jpg`);
  });
});

describe('pickPosterReference', () => {
  it('prefers the first usable reference', () => {
    expect(pickPosterReference('https://omdb/p.jpg', '/stored.jpg')).toBe(
      'https://omdb/p.jpg',
    );
  });

  it('skips empty and nan references', () => {
    expect(pickPosterReference(null, ' ', 'NaN', '/stored.jpg')).toBe('/stored.jpg');
    expect(pickPosterReference(undefined, 'nan')).toBeNull();
  });
});
