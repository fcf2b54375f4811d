import type { Layout, ResolvedConfig, Transcript } from '../types.js';
import { createTranscript } from '../transcript.js';
import { measureExons } from './exon-widths.js';
import { packExons, buildRows } from './row-packing.js';
import { buildConnectors } from './connectors.js';
import { buildMarkers } from './variant-markers.js';

/** Run the full layout pipeline. Config must already be resolved and validated. */
export function runPipeline(
  transcript: Transcript,
  config: ResolvedConfig,
): Layout {
  // Callers may hand in plain objects; check them like createTranscript does
  const { exons } = createTranscript(transcript.exons);

  // Step 1: Drawn width per exon, dropping exons with nothing to draw
  const drawn = measureExons(exons, config);

  // Step 2: Greedy row packing
  const placed = packExons(drawn, config);

  // Step 3: Glyphs, connectors and variant markers
  const rows = buildRows(placed, config);
  const connectors = buildConnectors(placed, config);
  const markers = buildMarkers(placed, config);

  const width = rows.reduce((max, row) => Math.max(max, row.width), 0);
  const height = rows.length === 0
    ? 0
    : rows.length * config.height + (rows.length - 1) * config.rowSpacing;

  return { rows, connectors, markers, width, height, config };
}
