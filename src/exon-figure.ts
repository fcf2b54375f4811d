import type { LayoutConfig, ResolvedConfig, Transcript, Layout, VectorImage } from './types.js';
import { ConfigError } from './errors.js';
import { runPipeline } from './internal/pipeline.js';
import { generateLayoutSvg } from './internal/svg-generator.js';

/**
 * Default configuration values. The gap is not listed: when unset it is
 * derived from the height (GAP_PER_HEIGHT).
 */
export const DEFAULT_CONFIG: Readonly<Required<Omit<LayoutConfig, 'gap'>>> = {
  maxWidth: Infinity,
  height: 20,
  includeNoncoding: false,
  scale: 1,
};

/** Default gap as a fraction of the exon height. */
export const GAP_PER_HEIGHT = 0.25;

/** Row spacing as a multiple of the gap. */
export const ROW_SPACING_PER_GAP = 2;

function requirePositive(field: keyof LayoutConfig, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(field, value, 'must be a positive number');
  }
}

/** Resolve a partial config into a full config with defaults, rejecting bad values. */
export function resolveConfig(config?: LayoutConfig): ResolvedConfig {
  // Field by field so an explicit undefined still falls back to the default
  const merged = {
    maxWidth: config?.maxWidth ?? DEFAULT_CONFIG.maxWidth,
    height: config?.height ?? DEFAULT_CONFIG.height,
    includeNoncoding: config?.includeNoncoding ?? DEFAULT_CONFIG.includeNoncoding,
    scale: config?.scale ?? DEFAULT_CONFIG.scale,
  };

  requirePositive('height', merged.height);
  requirePositive('scale', merged.scale);
  // Infinity is the unbounded default; anything else must be a positive number
  if (merged.maxWidth !== Infinity) {
    requirePositive('maxWidth', merged.maxWidth);
  }

  const gap = config?.gap ?? merged.height * GAP_PER_HEIGHT;
  requirePositive('gap', gap);

  return {
    maxWidth: merged.maxWidth,
    height: merged.height,
    gap,
    includeNoncoding: merged.includeNoncoding,
    scale: merged.scale,
    rowSpacing: gap * ROW_SPACING_PER_GAP,
  };
}

/** Reusable, stateless exon figure builder. */
export class ExonFigure {
  readonly config: Readonly<ResolvedConfig>;

  constructor(config?: LayoutConfig) {
    this.config = resolveConfig(config);
  }

  /** Pack the transcript's exons into rows. Pure function, no side effects. */
  layout(transcript: Transcript): Layout {
    return runPipeline(transcript, this.config);
  }

  /** Serialize a layout as SVG. */
  render(layout: Layout): VectorImage {
    return generateLayoutSvg(layout);
  }

  /** Layout and render in one go. */
  draw(transcript: Transcript): VectorImage {
    return this.render(this.layout(transcript));
  }
}

/** Lay out a transcript. For repeated use, prefer creating an ExonFigure instance. */
export function layout(transcript: Transcript, config?: LayoutConfig): Layout {
  return new ExonFigure(config).layout(transcript);
}

/** Serialize a layout produced by layout() as SVG. */
export function render(result: Layout): VectorImage {
  return generateLayoutSvg(result);
}

/** Lay out and render a transcript with the given config. */
export function draw(transcript: Transcript, config?: LayoutConfig): VectorImage {
  return new ExonFigure(config).draw(transcript);
}
