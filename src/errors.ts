/** Base class for every error raised by this package. */
export class ExonFigureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A LayoutConfig value is out of range. */
export class ConfigError extends ExonFigureError {
  readonly field: string;

  constructor(field: string, value: unknown, requirement: string) {
    super(`Invalid config value for ${field}: ${String(value)} (${requirement})`);
    this.field = field;
  }
}

export class EmptyTranscriptError extends ExonFigureError {
  constructor() {
    super('Transcript has no exons');
  }
}

/** An exon's length or coding range breaks 0 <= codingStart <= codingEnd <= length. */
export class InvalidExonError extends ExonFigureError {
  readonly exonIndex: number;

  constructor(exonIndex: number, reason: string) {
    super(`Exon ${exonIndex + 1} is invalid: ${reason}`);
    this.exonIndex = exonIndex;
  }
}

/** The identifier could not be turned into a transcript. */
export class ResolutionError extends ExonFigureError {
  readonly identifier: string;

  constructor(identifier: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.identifier = identifier;
  }
}
