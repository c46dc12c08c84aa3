import { levenshtein, nameSimilarity } from '../../src/identity/name-similarity';

describe('Name similarity', () => {
  it('should compute edit distance', () => {
    expect(levenshtein('kitten', 'sitting')).toBe(3);
    expect(levenshtein('', 'abc')).toBe(3);
    expect(levenshtein('same', 'same')).toBe(0);
  });

  it('should score identical names 100 regardless of case and spacing', () => {
    expect(nameSimilarity('Jane  Doe', ' jane doe')).toBe(100);
  });

  it('should score a one-letter difference on a ten-letter name as 90', () => {
    expect(nameSimilarity('Jon Smith', 'John Smith')).toBe(90);
  });

  it('should round the ratio', () => {
    expect(nameSimilarity('kitten', 'sitting')).toBe(57);
  });

  it('should score two empty names 0', () => {
    expect(nameSimilarity('', '   ')).toBe(0);
  });

  it('should be symmetric', () => {
    expect(nameSimilarity('Maria Garcia', 'Mario Garcia')).toBe(nameSimilarity('Mario Garcia', 'Maria Garcia'));
  });
});
