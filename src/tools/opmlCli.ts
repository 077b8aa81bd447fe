#!/usr/bin/env node
/**
 * OPML command-line tool
 * Reads an OPML document from a file or standard input and prints it as
 * JSON, as a feed list, or as canonical OPML.
 */

import * as fs from 'fs';
import { toJson } from '../convert/json';
import { isOpmlParseError } from '../errors';
import { flattenOutlines } from '../model/document';
import { parseOpml, ParseOptions } from '../parsers/opmlParser';
import { toXml } from '../serializers/opmlSerializer';
import { OpmlDocument } from '../types/opml';

export type OutputFormat = 'json' | 'json-pretty' | 'rss' | 'xml';

export interface CliArgs {
  file?: string;
  format: OutputFormat;
  verbose: boolean;
  maxDepth?: number;
}

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readFile: (path: string) => Promise<string>;
  readStdin: () => Promise<string>;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const FORMAT_FLAGS = new Map<string, OutputFormat>([
  ['--json', 'json'],
  ['--json-pretty', 'json-pretty'],
  ['--rss', 'rss'],
  ['--xml', 'xml'],
]);

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const HELP_TEXT = `
OPML command-line tool

Usage:
  opml [--file <path>] (--json | --json-pretty | --rss | --xml) [options]

Options:
  -f, --file <path>       OPML file to read (standard input when omitted)
      --json              Print the document as JSON
      --json-pretty       Print the document as indented JSON
      --rss               Print the text and xmlUrl of every outline that has an xmlUrl
      --xml               Print the document as canonical OPML 2.0
      --max-depth <n>     Reject outlines nested deeper than n
      --verbose           Print extra information to standard error
  -h, --help              Show this help message

Examples:
  opml --file feeds.opml --rss
  cat feeds.opml | opml --json-pretty
`;

/**
 * Parse command line arguments. Returns null when help was requested.
 */
export function parseArgs(argv: readonly string[]): CliArgs | null {
  let file: string | undefined;
  let maxDepth: number | undefined;
  let verbose = false;
  const formats: OutputFormat[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const nextArg = argv[i + 1];

    if (arg === '--help' || arg === '-h') {
      return null;
    } else if (arg === '--file' || arg === '-f') {
      if (nextArg === undefined || nextArg.startsWith('-')) {
        throw new UsageError(`${arg} requires a path`);
      }
      file = nextArg;
      i++;
    } else if (arg === '--max-depth') {
      const parsed = nextArg === undefined ? NaN : Number(nextArg);
      if (!Number.isInteger(parsed) || parsed < 1) {
        throw new UsageError('--max-depth requires a positive integer');
      }
      maxDepth = parsed;
      i++;
    } else if (arg === '--verbose') {
      verbose = true;
    } else {
      const format = FORMAT_FLAGS.get(arg);
      if (!format) {
        throw new UsageError(`Unknown argument: ${arg}`);
      }
      formats.push(format);
    }
  }

  if (formats.length === 0) {
    throw new UsageError('One of --json, --json-pretty, --rss or --xml is required');
  }
  if (formats.length > 1) {
    throw new UsageError('Only one output format may be given');
  }

  return { file, format: formats[0], verbose, maxDepth };
}

export function render(document: OpmlDocument, args: CliArgs, io: Pick<CliIo, 'stderr'>): string {
  switch (args.format) {
    case 'json':
      return `${JSON.stringify(toJson(document))}\n`;
    case 'json-pretty':
      return `${JSON.stringify(toJson(document), null, 2)}\n`;
    case 'xml':
      return `${toXml(document, { declaration: true, indent: '  ' })}\n`;
    case 'rss': {
      const lines: string[] = [];
      for (const outline of flattenOutlines(document.body.outlines)) {
        if (outline.xmlUrl !== undefined) {
          lines.push(outline.text, outline.xmlUrl);
        } else if (args.verbose) {
          io.stderr(`[CLI] Skipping "${outline.text}" because it has no xmlUrl attribute.\n`);
        }
      }
      return lines.map((line) => `${line}\n`).join('');
    }
  }
}

/**
 * Run the tool and resolve to the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  let args: CliArgs | null;
  try {
    args = parseArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr(`Error: ${err.message}\nRun with --help for usage.\n`);
      return EXIT_USAGE;
    }
    throw err;
  }

  if (args === null) {
    io.stdout(HELP_TEXT);
    return EXIT_OK;
  }

  const source = args.file ?? 'standard input';
  let text: string;
  try {
    text = args.file !== undefined ? await io.readFile(args.file) : await io.readStdin();
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    io.stderr(`Error: could not read ${source}: ${reason}\n`);
    return EXIT_FAILURE;
  }
  if (args.verbose) {
    io.stderr(`[CLI] Read ${text.length} characters from ${source}\n`);
  }

  const options: ParseOptions = { maxDepth: args.maxDepth };
  let document: OpmlDocument;
  try {
    document = parseOpml(text, options);
  } catch (err) {
    if (isOpmlParseError(err)) {
      io.stderr(`Error: ${err.message}\n`);
      return EXIT_FAILURE;
    }
    throw err;
  }
  if (args.verbose) {
    io.stderr(`[CLI] Parsed ${flattenOutlines(document.body.outlines).length} outline(s)\n`);
  }

  io.stdout(render(document, args, io));
  return EXIT_OK;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export const processIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  readFile: (path) => fs.promises.readFile(path, 'utf-8'),
  readStdin,
};

if (require.main === module) {
  runCli(process.argv.slice(2), processIo).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error('[CLI] Unexpected error:', err);
      process.exitCode = EXIT_FAILURE;
    }
  );
}
