import type { Glyph, ResolvedConfig, Row } from '../types.js';
import type { DrawnExon, PlacedExon } from './types.js';
import { regionOffsets } from './exon-widths.js';

/** Vertical position of a row's top edge. */
export function rowY(rowIndex: number, config: ResolvedConfig): number {
  return rowIndex * (config.height + config.rowSpacing);
}

/**
 * Greedy line-wrapping of exons into rows.
 *
 * An empty row takes the next exon whatever its width, so an exon wider than
 * maxWidth sits alone on its row instead of being split or rejected.
 */
export function packExons(exons: DrawnExon[], config: ResolvedConfig): PlacedExon[] {
  const placed: PlacedExon[] = [];
  let row = 0;
  let cursor = 0;

  for (const exon of exons) {
    if (cursor === 0) {
      placed.push({ exon, row, x: 0 });
      cursor = exon.width;
      continue;
    }

    if (cursor + config.gap + exon.width > config.maxWidth) {
      row++;
      placed.push({ exon, row, x: 0 });
      cursor = exon.width;
    } else {
      const x = cursor + config.gap;
      placed.push({ exon, row, x });
      cursor = x + exon.width;
    }
  }

  return placed;
}

/** Turn placed exons into rows of glyphs. */
export function buildRows(placed: PlacedExon[], config: ResolvedConfig): Row[] {
  const rows: Row[] = [];

  for (const { exon, row, x } of placed) {
    if (rows.length === row) {
      rows.push({ index: row, y: rowY(row, config), width: 0, glyphs: [] });
    }
    const current = rows[row];

    const offsets = regionOffsets(exon, config.gap);
    exon.regions.forEach((span, i) => {
      const glyph: Glyph = {
        exonIndex: exon.exonIndex,
        region: span.region,
        x: x + offsets[i],
        y: current.y,
        width: span.width,
        height: config.height,
      };
      if (span.startPhase !== undefined) glyph.startPhase = span.startPhase;
      if (span.endPhase !== undefined) glyph.endPhase = span.endPhase;
      current.glyphs.push(glyph);
    });
    current.width = x + exon.width;
  }

  return rows;
}
