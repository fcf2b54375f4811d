import type { Exon, Phase, Transcript, Variant } from './types.js';
import { EmptyTranscriptError, InvalidExonError } from './errors.js';

function isPhase(value: unknown): value is Phase {
  return value === 0 || value === 1 || value === 2;
}

function checkExon(exon: Exon, index: number): void {
  const { length, codingStart, codingEnd } = exon;
  if (!Number.isFinite(length) || length <= 0) {
    throw new InvalidExonError(index, `length must be positive, got ${length}`);
  }
  if (!Number.isFinite(codingStart) || !Number.isFinite(codingEnd)) {
    throw new InvalidExonError(index, 'coding range must be finite');
  }
  if (codingStart < 0 || codingStart > codingEnd || codingEnd > length) {
    throw new InvalidExonError(
      index,
      `coding range ${codingStart}-${codingEnd} does not fit in length ${length}`,
    );
  }
  for (const phase of [exon.startPhase, exon.endPhase]) {
    if (phase !== undefined && !isPhase(phase)) {
      throw new InvalidExonError(index, `phase must be 0, 1 or 2, got ${String(phase)}`);
    }
  }
  for (const variant of exon.variants ?? []) {
    if (!Number.isInteger(variant.position) || variant.position < 0 || variant.position >= length) {
      throw new InvalidExonError(
        index,
        `variant ${variant.description} at ${variant.position} is outside the exon`,
      );
    }
  }
}

function freezeExon(exon: Exon): Exon {
  const copy: Exon = {
    length: exon.length,
    codingStart: exon.codingStart,
    codingEnd: exon.codingEnd,
  };
  if (exon.startPhase !== undefined) copy.startPhase = exon.startPhase;
  if (exon.endPhase !== undefined) copy.endPhase = exon.endPhase;
  if (exon.variants !== undefined) {
    copy.variants = Object.freeze(exon.variants.map((v: Variant) => Object.freeze({ ...v })));
  }
  return Object.freeze(copy);
}

/** Build a frozen transcript, checking the structure of every exon. */
export function createTranscript(exons: readonly Exon[]): Transcript {
  if (exons.length === 0) {
    throw new EmptyTranscriptError();
  }

  const frozen = exons.map((exon, i) => {
    checkExon(exon, i);
    return freezeExon(exon);
  });

  return Object.freeze({ exons: Object.freeze(frozen) });
}

/** Exon with the coding region spanning all of it. */
export function codingExon(length: number): Exon {
  return { length, codingStart: 0, codingEnd: length };
}

/** Exon without a coding region. */
export function noncodingExon(length: number): Exon {
  return { length, codingStart: 0, codingEnd: 0 };
}
