import type { Exon, Phase, RegionKind } from '../types.js';

/** A region of an exon with its drawn width, before placement. */
export interface RegionSpan {
  region: RegionKind;
  width: number;
  /** Exon offsets [from, to) drawn by this region, left to right. */
  bases: [from: number, to: number][];
  startPhase?: Phase;
  endPhase?: Phase;
}

/** An exon that survives into the drawing, with its regions left to right. */
export interface DrawnExon {
  exonIndex: number;
  exon: Exon;
  /** One or two regions. */
  regions: RegionSpan[];
  /** Sum of region widths plus the gap between them. Always > 0. */
  width: number;
}

/** A drawn exon after packing: which row, and where the cursor put it. */
export interface PlacedExon {
  exon: DrawnExon;
  row: number;
  x: number;
}
