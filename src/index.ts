// Core
export { ExonFigure, layout, render, draw, resolveConfig, DEFAULT_CONFIG } from './exon-figure.js';
export { createTranscript, codingExon, noncodingExon } from './transcript.js';

// Errors
export {
  ExonFigureError,
  ConfigError,
  EmptyTranscriptError,
  InvalidExonError,
  ResolutionError,
} from './errors.js';

// Resolution
export { normalizeIdentifier, parseGeneMap } from './resolve/identifier.js';
export type { GeneMap } from './resolve/identifier.js';
export { MutalyzerClient, buildTranscript, parseNormalizeResponse } from './resolve/mutalyzer.js';
export type { MutalyzerClientOptions, Selector } from './resolve/mutalyzer.js';
export {
  isReverse,
  convertExonPositions,
  convertCodingPositions,
  codingWithin,
  advancePhase,
  makeCoding,
} from './resolve/positions.js';
export type { Range, PositionPair, Coding } from './resolve/positions.js';
export { parseViewVariants, inside, exonVariants } from './resolve/variants.js';
export type { ViewVariant } from './resolve/variants.js';

// Types
export type {
  Point,
  Phase,
  Variant,
  Exon,
  Transcript,
  LayoutConfig,
  ResolvedConfig,
  RegionKind,
  Glyph,
  VariantMarker,
  Row,
  ConnectorKind,
  Connector,
  Layout,
  VectorImage,
} from './types.js';
