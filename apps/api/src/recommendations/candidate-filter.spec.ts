import { filterCandidates } from './candidate-filter';
import { makeCandidate } from './test-fixtures';

const ids = (list: { id: string }[]) => list.map((c) => c.id);

describe('filterCandidates', () => {
  it('drops selected ids and selected titles case-insensitively', () => {
    const out = filterCandidates({
      candidates: [
        makeCandidate('1', { title: 'Alien' }),
        makeCandidate('2', { title: '  ALIEN ' }),
        makeCandidate('3', { title: 'Heat' }),
        makeCandidate('4', { title: 'Ronin' }),
      ],
      selectedIds: ['3'],
      selectedTitles: ['alien'],
      contextSize: 50,
    });

    expect(ids(out)).toEqual(['4']);
  });

  it('keeps the first occurrence of a duplicated id or title', () => {
    const out = filterCandidates({
      candidates: [
        makeCandidate('1', { title: 'Heat', similarityScore: 0.9 }),
        makeCandidate('1', { title: 'Heat (copy)', similarityScore: 0.8 }),
        makeCandidate('2', { title: 'heat' }),
        makeCandidate('3', { title: 'Ronin' }),
      ],
      selectedIds: [],
      selectedTitles: [],
      contextSize: 50,
    });

    expect(ids(out)).toEqual(['1', '3']);
    expect(out[0]?.similarityScore).toBe(0.9);
  });

  it('never treats untitled candidates as duplicates of each other', () => {
    const out = filterCandidates({
      candidates: [
        makeCandidate('1', { title: '' }),
        makeCandidate('2', { title: '   ' }),
      ],
      selectedIds: [],
      selectedTitles: [''],
      contextSize: 50,
    });

    expect(ids(out)).toEqual(['1', '2']);
  });

  it('truncates to the context size in index order', () => {
    const out = filterCandidates({
      candidates: ['a', 'b', 'c', 'd'].map((id) => makeCandidate(id)),
      selectedIds: ['a'],
      selectedTitles: [],
      contextSize: 2,
    });

    expect(ids(out)).toEqual(['b', 'c']);
  });

  it('returns nothing for an empty input', () => {
    expect(
      filterCandidates({
        candidates: [],
        selectedIds: ['1'],
        selectedTitles: ['Heat'],
        contextSize: 10,
      }),
    ).toEqual([]);
  });
});
