import { parseArgs } from 'node:util';
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { LayoutConfig, Transcript } from './types.js';
import { ExonFigureError } from './errors.js';
import { ExonFigure } from './exon-figure.js';
import { normalizeIdentifier, parseGeneMap } from './resolve/identifier.js';
import { MutalyzerClient } from './resolve/mutalyzer.js';

export const USAGE = `Usage: exon-figure <transcript> [options]

Draw the exons of a transcript (or HGVS description) as SVG on stdout.

Options:
  --max-width <n>        Wrap rows wider than n units (default: no wrapping)
  --height <n>           Exon height (default: 20)
  --gap <n>              Space between exons (default: height / 4)
  --scale <n>            Units per base (default: 1)
  --include-noncoding    Draw non-coding parts of exons
  --gene-map <file>      Tab-separated gene to transcript table
  --verbose              Print the exons to stderr
  -h, --help             Show this help`;

/** Bad command line. */
export class UsageError extends ExonFigureError {}

const positiveNumber = z.coerce.number().positive();

const OptionsSchema = z.object({
  'max-width': positiveNumber.optional(),
  'height': positiveNumber.optional(),
  'gap': positiveNumber.optional(),
  'scale': positiveNumber.optional(),
  'include-noncoding': z.boolean().default(false),
  'gene-map': z.string().optional(),
  'verbose': z.boolean().default(false),
  'help': z.boolean().default(false),
});

export interface CliOptions {
  transcript: string;
  config: LayoutConfig;
  geneMapPath: string | undefined;
  verbose: boolean;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        'max-width': { type: 'string' },
        'height': { type: 'string' },
        'gap': { type: 'string' },
        'scale': { type: 'string' },
        'include-noncoding': { type: 'boolean' },
        'gene-map': { type: 'string' },
        'verbose': { type: 'boolean' },
        'help': { type: 'boolean', short: 'h' },
      },
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err), { cause: err });
  }
}

/** Parse and validate argv. Returns null when help was requested. */
export function parseCliArgs(argv: string[]): CliOptions | null {
  const parsed = readArgs(argv);

  const result = OptionsSchema.safeParse(parsed.values);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new UsageError(`--${issue.path.join('.')}: ${issue.message}`);
  }
  const values = result.data;

  if (values.help) return null;

  if (parsed.positionals.length !== 1) {
    throw new UsageError(`Expected one transcript, got ${parsed.positionals.length}`);
  }

  return {
    transcript: parsed.positionals[0],
    config: {
      maxWidth: values['max-width'],
      height: values.height,
      gap: values.gap,
      scale: values.scale,
      includeNoncoding: values['include-noncoding'],
    },
    geneMapPath: values['gene-map'],
    verbose: values.verbose,
  };
}

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readFile: (path: string) => string;
  resolver: { resolve(description: string): Promise<Transcript> };
}

function defaultIO(): CliIO {
  return {
    stdout: text => process.stdout.write(text),
    stderr: text => console.error(text),
    readFile: path => readFileSync(path, 'utf-8'),
    resolver: new MutalyzerClient(),
  };
}

function readGeneMapFile(io: CliIO, path: string): string {
  try {
    return io.readFile(path);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new UsageError(`Cannot read gene map ${path}: ${reason}`, { cause: err });
  }
}

/** Run the command line. Returns the process exit code. */
export async function run(argv: string[], io: CliIO = defaultIO()): Promise<number> {
  try {
    const options = parseCliArgs(argv);
    if (options === null) {
      io.stdout(`${USAGE}\n`);
      return 0;
    }

    // Config problems surface before any lookup
    const figure = new ExonFigure(options.config);

    const geneMap = options.geneMapPath === undefined
      ? undefined
      : parseGeneMap(readGeneMapFile(io, options.geneMapPath));
    const description = normalizeIdentifier(options.transcript, geneMap);
    const transcript = await io.resolver.resolve(description);

    if (options.verbose) {
      transcript.exons.forEach((exon, i) => {
        io.stderr(`exon ${i + 1}: length=${exon.length} coding=${exon.codingStart}-${exon.codingEnd}`);
      });
    }

    io.stdout(figure.draw(transcript));
    return 0;
  } catch (err) {
    if (err instanceof ExonFigureError) {
      io.stderr(`error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}
