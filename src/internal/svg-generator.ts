import type { Connector, Glyph, Layout, Phase, Point, VariantMarker, VectorImage } from '../types.js';
import { GLYPH_STYLES, CONNECTOR_STYLES, VARIANT_STYLE, PHASE_NOTCH_RATIO } from './styles.js';

/** Format a coordinate with at most three decimals. */
export function formatNumber(value: number): string {
  return String(Number(value.toFixed(3)));
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function formatPoints(points: Point[]): string {
  return points.map(p => `${formatNumber(p.x)},${formatNumber(p.y)}`).join(' ');
}

/**
 * Outline of a coding glyph whose ends carry a reading-frame phase.
 * A phase 1 end is notched in on the right and pointed on the left, phase 2
 * the other way round, so consecutive exons read as interlocking pieces.
 */
export function phasedOutline(glyph: Glyph): Point[] {
  const { x, y, width, height } = glyph;
  const d = Math.min(height * PHASE_NOTCH_RATIO, width / 2);
  const right = x + width;
  const mid = y + height / 2;
  const bottom = y + height;

  const rightEdge: Record<Phase, Point[]> = {
    0: [{ x: right, y }, { x: right, y: bottom }],
    1: [{ x: right, y }, { x: right - d, y: mid }, { x: right, y: bottom }],
    2: [{ x: right - d, y }, { x: right, y: mid }, { x: right - d, y: bottom }],
  };
  const leftEdge: Record<Phase, Point[]> = {
    0: [{ x, y: bottom }, { x, y }],
    1: [{ x: x + d, y: bottom }, { x, y: mid }, { x: x + d, y }],
    2: [{ x, y: bottom }, { x: x + d, y: mid }, { x, y }],
  };

  return [...rightEdge[glyph.endPhase ?? 0], ...leftEdge[glyph.startPhase ?? 0]];
}

function glyphElement(glyph: Glyph): string {
  const style = GLYPH_STYLES[glyph.region];
  const stroke = style.stroke === null
    ? ''
    : ` stroke="${style.stroke}" stroke-width="${formatNumber(style.strokeWidth)}"`;

  if ((glyph.startPhase ?? 0) !== 0 || (glyph.endPhase ?? 0) !== 0) {
    return `    <polygon points="${formatPoints(phasedOutline(glyph))}" fill="${style.fill}"${stroke} />`;
  }

  const rx = style.rx > 0 ? ` rx="${formatNumber(style.rx)}"` : '';

  return `    <rect x="${formatNumber(glyph.x)}" y="${formatNumber(glyph.y)}" width="${formatNumber(glyph.width)}" height="${formatNumber(glyph.height)}"${rx} fill="${style.fill}"${stroke} />`;
}

function connectorElement(connector: Connector): string {
  const style = CONNECTOR_STYLES[connector.kind];
  const pointsStr = formatPoints(connector.points);
  const dash = style.dashArray === null ? '' : ` stroke-dasharray="${style.dashArray}"`;

  return `    <polyline points="${pointsStr}" fill="none" stroke="${style.stroke}" stroke-width="${formatNumber(style.strokeWidth)}"${dash} />`;
}

function markerElement(marker: VariantMarker): string {
  const color = escapeXml(marker.color ?? VARIANT_STYLE.stroke);
  const x = formatNumber(marker.x);

  return `    <line x1="${x}" y1="${formatNumber(marker.y)}" x2="${x}" y2="${formatNumber(marker.y + marker.height)}" stroke="${color}" stroke-width="${formatNumber(VARIANT_STYLE.strokeWidth)}"><title>${escapeXml(marker.description)}</title></line>`;
}

/**
 * Generate a standalone SVG document for a layout.
 *
 * The canvas is the layout's bounding box with a margin of one gap on every
 * side, which leaves room for the row-wrap connectors that step outside the
 * rows. Connectors are emitted before glyphs so exons paint over them, and
 * variant markers last.
 */
export function generateLayoutSvg(layout: Layout): VectorImage {
  const margin = layout.config.gap;
  const width = formatNumber(layout.width + 2 * margin);
  const height = formatNumber(layout.height + 2 * margin);

  const elements: string[] = [];
  for (const connector of layout.connectors) {
    elements.push(connectorElement(connector));
  }
  for (const row of layout.rows) {
    for (const glyph of row.glyphs) {
      elements.push(glyphElement(glyph));
    }
  }
  for (const marker of layout.markers) {
    elements.push(markerElement(marker));
  }

  const body = elements.length === 0 ? '' : `${elements.join('\n')}\n`;
  const m = formatNumber(margin);

  return `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">\n  <g transform="translate(${m},${m})">\n${body}  </g>\n</svg>\n`;
}
