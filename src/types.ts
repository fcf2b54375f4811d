/** A point in drawing units. */
export interface Point {
  x: number;
  y: number;
}

/** Position of a base within its codon. */
export type Phase = 0 | 1 | 2;

/** A variant inside an exon. */
export interface Variant {
  /** Offset of the variant's first base from the exon start, 5' to 3'. */
  position: number;
  /** HGVS description, e.g. 274G>T. */
  description: string;
  /** Marker color. Default: the variant style's stroke */
  color?: string;
}

/** One spliced segment of a transcript. */
export interface Exon {
  /** Length of the exon in bases. Always positive. */
  length: number;
  /** Offset within the exon where the coding region starts. */
  codingStart: number;
  /**
   * Offset within the exon where the coding region ends (exclusive).
   * Equal to codingStart for a fully non-coding exon.
   */
  codingEnd: number;
  /** Codon phase of the first coding base. */
  startPhase?: Phase;
  /** Codon phase following the last coding base. */
  endPhase?: Phase;
  variants?: readonly Variant[];
}

/** Exons of a transcript in 5' to 3' order. Never empty. */
export interface Transcript {
  exons: readonly Exon[];
}

/** Optional layout knobs, set on the ExonFigure constructor. */
export interface LayoutConfig {
  /** Maximum row width in drawing units. Default: unbounded (single row) */
  maxWidth?: number;
  /** Height of an exon glyph. Default: 20 */
  height?: number;
  /** Horizontal space between exons on a row. Default: height / 4 */
  gap?: number;
  /** Draw the non-coding parts of exons. Default: false */
  includeNoncoding?: boolean;
  /** Drawing units per base. Default: 1 */
  scale?: number;
}

/** Config with all defaults applied. */
export interface ResolvedConfig {
  maxWidth: number;
  height: number;
  gap: number;
  includeNoncoding: boolean;
  scale: number;
  /** Vertical space between rows, always a multiple of gap. */
  rowSpacing: number;
}

export type RegionKind = 'coding' | 'non-coding';

/** A positioned rectangle for one region of one exon. */
export interface Glyph {
  /** Index of the exon in the transcript (skipped exons keep their index). */
  exonIndex: number;
  region: RegionKind;
  x: number;
  y: number;
  width: number;
  height: number;
  /** Only on coding glyphs of exons that carry phases. Non-zero phases shape the glyph's ends. */
  startPhase?: Phase;
  endPhase?: Phase;
}

/** A vertical tick across the glyph that holds a variant. */
export interface VariantMarker {
  exonIndex: number;
  description: string;
  color: string | undefined;
  x: number;
  y: number;
  height: number;
}

/** Glyphs sharing one horizontal band. */
export interface Row {
  index: number;
  y: number;
  /** Extent used by the glyphs and gaps on this row. */
  width: number;
  glyphs: Glyph[];
}

/**
 * same-row: straight link between neighbours on one row.
 * row-wrap: stepped link from the end of one row to the start of the next.
 */
export type ConnectorKind = 'same-row' | 'row-wrap';

/** The intron between two consecutive drawn exons. */
export interface Connector {
  kind: ConnectorKind;
  fromExon: number;
  toExon: number;
  /** Polyline vertices, first on the left exon's right edge, last on the right exon's left edge. */
  points: Point[];
}

/** The complete result returned by layout(). */
export interface Layout {
  rows: Row[];
  connectors: Connector[];
  /** Variants that fall in a drawn region, in exon order. */
  markers: VariantMarker[];
  /** Width of the widest row. May exceed maxWidth for a single oversized exon. */
  width: number;
  /** Height of all rows stacked. */
  height: number;
  config: ResolvedConfig;
}

/** A serialized SVG document. */
export type VectorImage = string;
