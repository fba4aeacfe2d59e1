import { buildAugmentedQuery } from './query-augmenter';

describe('buildAugmentedQuery', () => {
  it('returns the query untouched when nothing was selected', () => {
    expect(buildAugmentedQuery('space opera with heart', [])).toBe(
      'space opera with heart',
    );
  });

  it('prefixes liked titles in selection order', () => {
    expect(buildAugmentedQuery('slow burn', ['Alien', 'Heat'])).toBe(
      'Movies similar to Alien, Heat. Context: slow burn',
    );
  });

  it('keeps an empty query as an empty context', () => {
    expect(buildAugmentedQuery('', ['Alien'])).toBe(
      'Movies similar to Alien. Context: ',
    );
  });
});
