import type { ConnectorKind, RegionKind } from '../types.js';

export interface GlyphStyle {
  fill: string;
  stroke: string | null;
  strokeWidth: number;
  /** Corner radius. */
  rx: number;
}

export interface ConnectorStyle {
  stroke: string;
  strokeWidth: number;
  dashArray: string | null;
}

export const GLYPH_STYLES: Readonly<Record<RegionKind, GlyphStyle>> = {
  'coding': { fill: '#4c72b7', stroke: null, strokeWidth: 0, rx: 3 },
  'non-coding': { fill: '#dbe4f3', stroke: '#4c72b7', strokeWidth: 1, rx: 0 },
};

export const CONNECTOR_STYLES: Readonly<Record<ConnectorKind, ConnectorStyle>> = {
  'same-row': { stroke: '#555555', strokeWidth: 1.5, dashArray: null },
  'row-wrap': { stroke: '#555555', strokeWidth: 1.5, dashArray: '4,3' },
};

export interface VariantStyle {
  stroke: string;
  strokeWidth: number;
}

export const VARIANT_STYLE: Readonly<VariantStyle> = { stroke: 'red', strokeWidth: 2 };

/** Depth of the notch or point at a phased glyph end, as a fraction of the glyph height. */
export const PHASE_NOTCH_RATIO = 0.25;
