import { similarityRatio } from './text-similarity';

describe('similarityRatio', () => {
  it('scores identical strings as 1', () => {
    expect(similarityRatio('subscribe', 'subscribe')).toBe(1);
    expect(similarityRatio('', '')).toBe(1);
  });

  it('counts the longest block and recurses on both sides', () => {
    expect(similarityRatio('abcd', 'bcde')).toBe(0.75);
    // "subscr" + "be" matched out of 17 characters
    expect(similarityRatio('subscribe', 'subscrbe')).toBeCloseTo(16 / 17, 10);
  });

  it('scores disjoint strings as 0', () => {
    expect(similarityRatio('abc', 'xyz')).toBe(0);
    expect(similarityRatio('abc', '')).toBe(0);
  });
});
