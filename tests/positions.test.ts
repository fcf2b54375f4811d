import { describe, it, expect } from 'vitest';
import {
  convertCodingPositions,
  convertExonPositions,
  codingWithin,
  isReverse,
  makeCoding,
  advancePhase,
} from '../src/resolve/positions.js';

describe('Mutalyzer positions', () => {
  it('converts 1-based inclusive pairs to 0-based half-open ranges', () => {
    expect(convertExonPositions([['1', '268'], ['269', '330'], ['11284', '13992']])).toEqual([
      [0, 268],
      [268, 330],
      [11283, 13992],
    ]);
  });

  it('returns reverse-strand exons in ascending genomic order', () => {
    expect(convertExonPositions([['9000', '8001'], ['5000', '4501'], ['300', '1']])).toEqual([
      [0, 300],
      [4500, 5000],
      [8000, 9000],
    ]);
  });

  it('converts the coding region on either strand', () => {
    expect(convertCodingPositions([['238', '11295']])).toEqual([237, 11295]);
    expect(convertCodingPositions([['29199', '7218']])).toEqual([7217, 29199]);
  });

  it('rejects more than one coding region', () => {
    expect(() => convertCodingPositions([['1', '10'], ['20', '30']])).toThrow(RangeError);
  });

  it('detects the strand from the first pair', () => {
    expect(isReverse([['10', '4']])).toBe(true);
    expect(isReverse([['4', '10']])).toBe(false);
    expect(isReverse([])).toBe(false);
  });

  it('skips one-base pairs when detecting the strand', () => {
    expect(isReverse([['5', '5'], ['3', '1']])).toBe(true);
    expect(isReverse([['5', '5'], ['7', '9']])).toBe(false);
    expect(isReverse([['5', '5']])).toBe(false);
  });

  it('orders a reverse-strand list that starts with a one-base exon', () => {
    expect(convertExonPositions([['500', '500'], ['300', '201']])).toEqual([
      [200, 300],
      [499, 500],
    ]);
  });
});

describe('codingWithin', () => {
  it.each([
    [[0, 10], [20, 30], [0, 0]],
    [[0, 10], [0, 10], [0, 10]],
    [[0, 10], [5, 12], [5, 10]],
    [[0, 10], [-5, 12], [0, 10]],
    [[100, 110], [100, 200], [0, 10]],
    [[100, 110], [90, 100], [0, 0]],
  ] as const)('exon %j with coding %j gives %j', (exon, coding, expected) => {
    expect(codingWithin(exon, coding)).toEqual(expected);
  });
});

describe('makeCoding', () => {
  it.each([
    [[0, 10], [20, 30], 0, { start: 0, end: 0, startPhase: 0, endPhase: 0 }],
    [[0, 10], [0, 10], 0, { start: 0, end: 10, startPhase: 0, endPhase: 1 }],
    [[0, 10], [5, 12], 0, { start: 5, end: 10, startPhase: 0, endPhase: 2 }],
    [[0, 10], [-5, 12], 2, { start: 0, end: 10, startPhase: 2, endPhase: 0 }],
    [[100, 110], [100, 200], 0, { start: 0, end: 10, startPhase: 0, endPhase: 1 }],
  ] as const)('exon %j with coding %j entered at phase %i', (exon, coding, phase, expected) => {
    expect(makeCoding(exon, coding, phase)).toEqual(expected);
  });

  it('ignores the entry phase of an exon without coding bases', () => {
    expect(makeCoding([0, 10], [20, 30], 2)).toEqual({ start: 0, end: 0, startPhase: 0, endPhase: 0 });
  });
});

describe('advancePhase', () => {
  it('wraps around the codon', () => {
    expect(advancePhase(0, 3)).toBe(0);
    expect(advancePhase(1, 4)).toBe(2);
    expect(advancePhase(2, 1)).toBe(0);
  });
});
