import type { Phase } from '../types.js';

/** Half-open [start, end) interval in 0-based coordinates. */
export type Range = readonly [start: number, end: number];

/** A Mutalyzer position pair: 1-based, inclusive, as strings. */
export type PositionPair = readonly [string, string];

/** Coding part of an exon relative to its start, with the codon phase at both ends. */
export interface Coding {
  start: number;
  end: number;
  startPhase: Phase;
  endPhase: Phase;
}

const PHASES = [0, 1, 2] as const;

/**
 * Reverse-strand transcripts list their positions high to low. One-base
 * pairs read the same both ways, so the first pair whose ends differ decides.
 */
export function isReverse(positions: readonly PositionPair[]): boolean {
  const pair = positions.find(([start, end]) => Number(start) !== Number(end));
  return pair !== undefined && Number(pair[0]) > Number(pair[1]);
}

function toRange(pair: PositionPair): Range {
  const a = Number(pair[0]);
  const b = Number(pair[1]);
  return a <= b ? [a - 1, b] : [b - 1, a];
}

/** Convert exon positions to ranges in ascending genomic order. */
export function convertExonPositions(
  positions: readonly PositionPair[],
  reverse: boolean = isReverse(positions),
): Range[] {
  const ranges = positions.map(toRange);
  return reverse ? ranges.reverse() : ranges;
}

/** Convert the single CDS position pair to a range. */
export function convertCodingPositions(positions: readonly PositionPair[]): Range {
  if (positions.length !== 1) {
    throw new RangeError(`Expected exactly one coding region, got ${positions.length}`);
  }
  return toRange(positions[0]);
}

/** Part of the coding range inside the exon, relative to the exon start. [0, 0] when disjoint. */
export function codingWithin(exon: Range, coding: Range): Range {
  const start = Math.max(exon[0], coding[0]);
  const end = Math.min(exon[1], coding[1]);
  if (start >= end) return [0, 0];
  return [start - exon[0], end - exon[0]];
}

/** Phase after `length` more coding bases. */
export function advancePhase(phase: Phase, length: number): Phase {
  return PHASES[(phase + length) % 3];
}

/** Coding part of an exon entered at `startPhase`. All zero when the exon has no coding bases. */
export function makeCoding(exon: Range, coding: Range, startPhase: Phase): Coding {
  const [start, end] = codingWithin(exon, coding);
  if (start === end) {
    return { start: 0, end: 0, startPhase: 0, endPhase: 0 };
  }
  return { start, end, startPhase, endPhase: advancePhase(startPhase, end - start) };
}
