import type { Connector, ResolvedConfig } from '../types.js';
import type { PlacedExon } from './types.js';
import { rowY } from './row-packing.js';

/** Horizontal link at mid height between two neighbours on one row. */
function sameRowConnector(from: PlacedExon, to: PlacedExon, config: ResolvedConfig): Connector {
  const y = rowY(from.row, config) + config.height / 2;
  return {
    kind: 'same-row',
    fromExon: from.exon.exonIndex,
    toExon: to.exon.exonIndex,
    points: [
      { x: from.x + from.exon.width, y },
      { x: to.x, y },
    ],
  };
}

/**
 * Stepped link from the end of one row to the start of the next: out to the
 * right by half a gap, down into the middle of the row spacing, back past the
 * left edge by half a gap, then down and into the next exon.
 */
function rowWrapConnector(from: PlacedExon, to: PlacedExon, config: ResolvedConfig): Connector {
  const half = config.gap / 2;
  const fromY = rowY(from.row, config) + config.height / 2;
  const toY = rowY(to.row, config) + config.height / 2;
  const bandY = rowY(from.row, config) + config.height + config.rowSpacing / 2;
  const right = from.x + from.exon.width;

  return {
    kind: 'row-wrap',
    fromExon: from.exon.exonIndex,
    toExon: to.exon.exonIndex,
    points: [
      { x: right, y: fromY },
      { x: right + half, y: fromY },
      { x: right + half, y: bandY },
      { x: to.x - half, y: bandY },
      { x: to.x - half, y: toY },
      { x: to.x, y: toY },
    ],
  };
}

/** One connector per pair of consecutive placed exons. */
export function buildConnectors(placed: PlacedExon[], config: ResolvedConfig): Connector[] {
  const connectors: Connector[] = [];

  for (let i = 0; i < placed.length - 1; i++) {
    const from = placed[i];
    const to = placed[i + 1];
    connectors.push(
      from.row === to.row
        ? sameRowConnector(from, to, config)
        : rowWrapConnector(from, to, config),
    );
  }

  return connectors;
}
