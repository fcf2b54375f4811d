import type { ResolvedConfig, VariantMarker } from '../types.js';
import type { PlacedExon } from './types.js';
import { regionOffsets } from './exon-widths.js';
import { rowY } from './row-packing.js';

/** x of the middle of the base at `position`, or null when that base is not drawn. */
function basePosition(placed: PlacedExon, position: number, config: ResolvedConfig): number | null {
  const offsets = regionOffsets(placed.exon, config.gap);

  for (let i = 0; i < placed.exon.regions.length; i++) {
    let drawnBefore = 0;
    for (const [from, to] of placed.exon.regions[i].bases) {
      if (position >= from && position < to) {
        return placed.x + offsets[i] + (drawnBefore + position - from + 0.5) * config.scale;
      }
      drawnBefore += to - from;
    }
  }
  return null;
}

/** One marker per variant that lands on a drawn base. */
export function buildMarkers(placed: PlacedExon[], config: ResolvedConfig): VariantMarker[] {
  const markers: VariantMarker[] = [];

  for (const item of placed) {
    for (const variant of item.exon.exon.variants ?? []) {
      const x = basePosition(item, variant.position, config);
      if (x === null) continue;
      markers.push({
        exonIndex: item.exon.exonIndex,
        description: variant.description,
        color: variant.color,
        x,
        y: rowY(item.row, config),
        height: config.height,
      });
    }
  }

  return markers;
}
