import { describe, it, expect } from 'vitest';
import { fuzzyMatch, EXACT_SCORE, FUZZY_CEILING, MAX_MATCH_LENGTH } from '../src/matcher';

describe('fuzzyMatch', () => {
  it('scores a name against itself in the exact tier', () => {
    for (const name of ['nf-cod-account', 'x', 'nf-md-account_box']) {
      expect(fuzzyMatch(name, name)).toEqual({ score: EXACT_SCORE, isMatch: true });
    }
    expect(fuzzyMatch('NF-Cod-Account', 'nf-cod-account')).toEqual({ score: EXACT_SCORE, isMatch: true });
  });

  it('matches everything with score 0 for an empty query', () => {
    expect(fuzzyMatch('', 'nf-cod-account')).toEqual({ score: 0, isMatch: true });
    expect(fuzzyMatch('', '')).toEqual({ score: 0, isMatch: true });
  });

  it('never matches an empty name with a non-empty query', () => {
    expect(fuzzyMatch('a', '')).toEqual({ score: 0, isMatch: false });
    expect(fuzzyMatch('cod', '')).toEqual({ score: 0, isMatch: false });
  });

  it('gives prefix substrings a bonus over interior ones', () => {
    expect(fuzzyMatch('ab', 'abc').score).toBe(6998);
    expect(fuzzyMatch('ab', 'xabx').score).toBe(4996);
  });

  it('ranks any substring above a fuzzy hit on an equal-length name', () => {
    const substring = fuzzyMatch('acc', 'xaccx');
    const fuzzy = fuzzyMatch('acc', 'axcxc');
    expect(substring).toEqual({ score: 4996, isMatch: true });
    expect(fuzzy).toEqual({ score: 494, isMatch: true });
  });

  it('requires query characters in order', () => {
    expect(fuzzyMatch('ac', 'abc')).toEqual({ score: 397, isMatch: true });
    expect(fuzzyMatch('ca', 'abc')).toEqual({ score: 0, isMatch: false });
  });

  it('prefers contiguous runs over scattered hits', () => {
    expect(fuzzyMatch('abc', 'abcxyz').score).toBe(6994);
    expect(fuzzyMatch('abc', 'axbxcx').score).toBe(491);
    expect(fuzzyMatch('abd', 'abxd').score).toBe(547);
    expect(fuzzyMatch('abd', 'axbxd').score).toBe(494);
    expect(fuzzyMatch('abcz', 'abcxz').score).toBe(747);
  });

  it('rewards matches that start after a separator', () => {
    expect(fuzzyMatch('cod', 'nf-cod-account').score).toBe(5978);
    expect(fuzzyMatch('cod', 'nfxcodxaccount').score).toBe(4978);
    expect(fuzzyMatch('cod', 'nf_cod').score).toBe(5994);
    expect(fuzzyMatch('ca', 'x-cy-a').score).toBe(588);
    expect(fuzzyMatch('ca', 'xxcyxa').score).toBe(188);
  });

  it('looks past the first occurrence for a word boundary', () => {
    expect(fuzzyMatch('ab', 'xab-ab').score).toBe(5992);
  });

  it('keeps fuzzy scores under the substring tier', () => {
    const query = 'abcdefghijklmnopqrst';
    const name = query.split('').join('-');
    expect(fuzzyMatch(query, name)).toEqual({ score: FUZZY_CEILING, isMatch: true });
  });

  it('compares long names in full for the exact and substring tiers', () => {
    expect(fuzzyMatch('a'.repeat(300), 'a'.repeat(300))).toEqual({ score: EXACT_SCORE, isMatch: true });
    expect(fuzzyMatch('a'.repeat(256), 'a'.repeat(256) + 'b')).toEqual({ score: 6998, isMatch: true });
    expect(fuzzyMatch('zz', 'a'.repeat(300) + 'zz')).toEqual({ score: 4490, isMatch: true });
  });

  it('skips the subsequence tier past the length limit', () => {
    const long = 'a' + 'x'.repeat(MAX_MATCH_LENGTH) + 'b';
    expect(fuzzyMatch('ab', long)).toEqual({ score: 0, isMatch: false });
    expect(fuzzyMatch('ab', 'a' + 'x'.repeat(MAX_MATCH_LENGTH - 2) + 'b').isMatch).toBe(true);
  });
});
