import { ResolutionError } from '../errors.js';

/** Gene symbol to transcript, e.g. a MANE Select table. */
export type GeneMap = ReadonlyMap<string, string>;

/** Parse `gene<TAB>transcript` lines. Blank lines are ignored. */
export function parseGeneMap(text: string): GeneMap {
  const map = new Map<string, string>();

  for (const line of text.split('\n')) {
    if (line.trim() === '') continue;
    const [gene, transcript] = line.replace(/\r$/, '').split('\t');
    if (!gene || !transcript) {
      throw new ResolutionError(line, `Malformed gene map line: ${line}`);
    }
    map.set(gene, transcript);
  }

  return map;
}

/**
 * Turn user input into an HGVS description Mutalyzer can normalize.
 *
 * A known gene symbol becomes its transcript. A versioned transcript without
 * a variant gets the empty variant `c.=`. An unversioned transcript is
 * rejected since the version cannot be guessed.
 */
export function normalizeIdentifier(input: string, geneMap?: GeneMap): string {
  const identifier = geneMap?.get(input) ?? input;

  if (/^\w+\.\d+$/.test(identifier)) {
    return `${identifier}:c.=`;
  }

  if (/^\w+$/.test(identifier)) {
    throw new ResolutionError(
      identifier,
      `Please specify the version of the transcript you are interested in: ${identifier}`,
    );
  }

  return identifier;
}
