import type { Exon, ResolvedConfig } from '../types.js';
import type { DrawnExon, RegionSpan } from './types.js';

function codingRegion(exon: Exon, scale: number): RegionSpan {
  const span: RegionSpan = {
    region: 'coding',
    width: (exon.codingEnd - exon.codingStart) * scale,
    bases: [[exon.codingStart, exon.codingEnd]],
  };
  if (exon.startPhase !== undefined) span.startPhase = exon.startPhase;
  if (exon.endPhase !== undefined) span.endPhase = exon.endPhase;
  return span;
}

/**
 * Split an exon into at most two drawn regions, left to right.
 *
 * Non-coding bases on both sides of the coding range are drawn as a single
 * non-coding region ahead of the coding one.
 */
export function exonRegions(exon: Exon, config: ResolvedConfig): RegionSpan[] {
  const { scale } = config;
  const coding = exon.codingEnd - exon.codingStart;

  if (!config.includeNoncoding) {
    return coding > 0 ? [codingRegion(exon, scale)] : [];
  }

  // A non-coding exon has codingStart == codingEnd, possibly not at 0
  if (coding === 0) {
    return [{ region: 'non-coding', width: exon.length * scale, bases: [[0, exon.length]] }];
  }

  const bases: [number, number][] = [];
  if (exon.codingStart > 0) bases.push([0, exon.codingStart]);
  if (exon.codingEnd < exon.length) bases.push([exon.codingEnd, exon.length]);
  if (bases.length === 0) return [codingRegion(exon, scale)];

  const noncoding: RegionSpan = {
    region: 'non-coding',
    width: (exon.length - coding) * scale,
    bases,
  };
  // Only a trailing part goes after the coding region
  return exon.codingStart === 0
    ? [codingRegion(exon, scale), noncoding]
    : [noncoding, codingRegion(exon, scale)];
}

/** Left edge of each region relative to the exon's own x, with the gap between regions. */
export function regionOffsets(exon: DrawnExon, gap: number): number[] {
  const offsets: number[] = [];
  let x = 0;
  for (const span of exon.regions) {
    offsets.push(x);
    x += span.width + gap;
  }
  return offsets;
}

/** Compute drawn widths for all exons, skipping those that draw nothing. */
export function measureExons(exons: readonly Exon[], config: ResolvedConfig): DrawnExon[] {
  const drawn: DrawnExon[] = [];

  exons.forEach((exon, exonIndex) => {
    const regions = exonRegions(exon, config);
    if (regions.length === 0) return;
    const width = regions.reduce((sum, r) => sum + r.width, 0) + config.gap * (regions.length - 1);
    drawn.push({ exonIndex, exon, regions, width });
  });

  return drawn;
}
