import { z } from 'zod';
import type { Exon, Phase, Transcript } from '../types.js';
import { ResolutionError } from '../errors.js';
import { createTranscript } from '../transcript.js';
import {
  convertCodingPositions,
  convertExonPositions,
  isReverse,
  makeCoding,
  type Range,
} from './positions.js';
import { exonVariants, parseViewVariants, type ViewVariant } from './variants.js';

export const DEFAULT_MUTALYZER_URL = 'https://mutalyzer.nl/api';

// Mutalyzer sends positions as strings; accept plain integers too
const PositionSchema = z.union([
  z.string().regex(/^\d+$/, 'position must be a positive integer'),
  z.number().int().positive().transform(String),
]);

const PositionPairsSchema = z.array(z.tuple([PositionSchema, PositionSchema]));

/** The part of a normalize response that describes the transcript structure. */
export const SelectorSchema = z.object({
  exon: z.object({ g: PositionPairsSchema.min(1, 'transcript has no exons') }),
  cds: z.object({ g: PositionPairsSchema.max(1, 'expected at most one coding region') }).optional(),
});

export type Selector = z.infer<typeof SelectorSchema>;

const NormalizeResponseSchema = z.object({
  selector_short: SelectorSchema,
});

const ErrorResponseSchema = z.object({
  custom: z.object({
    errors: z.array(z.object({ details: z.string() })).min(1),
  }),
});

const ViewVariantsResponseSchema = z.object({
  views: z.array(z.unknown()),
});

/** Reverse-strand coordinates read 5' to 3' once negated. */
function flip(range: Range): Range {
  return [-range[1], -range[0]];
}

/**
 * Build a transcript from Mutalyzer exon and CDS positions and the variants
 * of a view_variants response.
 *
 * Exons come out in 5' to 3' order: on the reverse strand the genomic order
 * is flipped and coding ranges and variant positions are mirrored within each
 * exon. Codon phases carry over from one exon to the next.
 */
export function buildTranscript(selector: Selector, variants: readonly ViewVariant[] = []): Transcript {
  const cdsPairs = selector.cds?.g ?? [];
  const reverse = isReverse([...selector.exon.g, ...cdsPairs]);
  const genomic = convertExonPositions(selector.exon.g, reverse);
  const cds = cdsPairs.length > 0 ? convertCodingPositions(cdsPairs) : null;

  const ranges = reverse ? [...genomic].reverse().map(flip) : genomic;
  const coding = cds !== null && reverse ? flip(cds) : cds;
  const oriented = reverse
    ? variants.map(v => ({ ...v, start: -v.start - 1 }))
    : variants;

  let phase: Phase = 0;
  const exons: Exon[] = ranges.map(range => {
    const exon: Exon = { length: range[1] - range[0], codingStart: 0, codingEnd: 0 };

    if (coding !== null) {
      const part = makeCoding(range, coding, phase);
      exon.codingStart = part.start;
      exon.codingEnd = part.end;
      exon.startPhase = part.startPhase;
      exon.endPhase = part.endPhase;
      if (part.start !== part.end) phase = part.endPhase;
    }

    const inExon = exonVariants(range, oriented);
    if (inExon.length > 0) exon.variants = inExon;

    return exon;
  });

  return createTranscript(exons);
}

/** Validate a normalize response body and build its transcript. */
export function parseNormalizeResponse(
  body: unknown,
  description: string,
  variants: readonly ViewVariant[] = [],
): Transcript {
  const parsed = NormalizeResponseSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ResolutionError(
      description,
      `Unexpected Mutalyzer response for ${description}${where}: ${issue.message}`,
    );
  }
  return buildTranscript(parsed.data.selector_short, variants);
}

export interface MutalyzerClientOptions {
  /** Default: https://mutalyzer.nl/api */
  baseUrl?: string;
  /** Default: the global fetch. */
  fetch?: typeof fetch;
}

/** Resolves HGVS descriptions to transcripts through the Mutalyzer normalize endpoint. */
export class MutalyzerClient {
  readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: MutalyzerClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_MUTALYZER_URL).replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? fetch;
  }

  /** Normalize the description and place its variants on the exons. */
  async resolve(description: string): Promise<Transcript> {
    const normalized = await this.getJson('normalize', description);
    const views = await this.getJson('view_variants', description);

    const parsedViews = ViewVariantsResponseSchema.safeParse(views);
    if (!parsedViews.success) {
      throw new ResolutionError(description, `Unexpected Mutalyzer variant view for ${description}`);
    }
    const variants = parseViewVariants(parsedViews.data.views, description);

    return parseNormalizeResponse(normalized, description, variants);
  }

  private async getJson(endpoint: string, description: string): Promise<unknown> {
    const url = `${this.baseUrl}/${endpoint}/${encodeURIComponent(description)}`;

    let response: Response;
    try {
      response = await this.fetchImpl(url);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ResolutionError(description, `Could not reach Mutalyzer: ${reason}`, { cause: err });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new ResolutionError(
        description,
        `Mutalyzer returned a non-JSON response (HTTP ${response.status})`,
        { cause: err },
      );
    }

    if (!response.ok) {
      const details = ErrorResponseSchema.safeParse(body);
      const reason = details.success
        ? details.data.custom.errors.map(e => e.details).join('; ')
        : `HTTP ${response.status}`;
      throw new ResolutionError(description, `Mutalyzer could not resolve ${description}: ${reason}`);
    }

    return body;
  }
}
