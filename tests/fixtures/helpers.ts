import type { Exon, Layout, Transcript } from '../../src/types.js';
import { createTranscript, codingExon } from '../../src/transcript.js';

/** Create an exon with an explicit coding range. */
export function makeExon(length: number, codingStart: number, codingEnd: number): Exon {
  return { length, codingStart, codingEnd };
}

/** Create a transcript of fully coding exons with the given lengths. */
export function makeCodingTranscript(lengths: number[]): Transcript {
  return createTranscript(lengths.map(codingExon));
}

/** Create a transcript from explicit exons. */
export function makeTranscript(exons: Exon[]): Transcript {
  return createTranscript(exons);
}

/** Exon indices per row, in drawing order (one entry per exon, not per glyph). */
export function exonsByRow(layout: Layout): number[][] {
  return layout.rows.map(row => {
    const indices: number[] = [];
    for (const glyph of row.glyphs) {
      if (indices[indices.length - 1] !== glyph.exonIndex) {
        indices.push(glyph.exonIndex);
      }
    }
    return indices;
  });
}

/** Build a JSON Response the way fetch would return it. */
export function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}
