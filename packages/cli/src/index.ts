#!/usr/bin/env node

/**
 * Command line interface for rubify
 *
 * Prints text with furigana, as bracketed text, HTML ruby markup or the
 * token JSON the analyzer produces.
 */

import { readFileSync } from 'fs';
import { pathToFileURL } from 'url';
import { Command, Option } from 'commander';
import { config } from 'dotenv';
import {
  FuriganaAnalyzer,
  getConfigFromEnv,
  isTokenLayout,
  loadKuromojiTokenizer,
  printPerfCountersAndReset,
  render,
  serializeTokens,
  setDebug,
  TOKEN_LAYOUTS,
  type MorphTokenizer,
  type TokenLayout
} from '@rubify/core';

export type OutputFormat = 'text' | 'html' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'html', 'json'];

export interface CliOptions {
  format?: OutputFormat;
  layout?: TokenLayout;
  hiragana?: boolean;
  userDictCsv?: string;
}

export interface ParsedArgs {
  input: string;
  format: OutputFormat;
  layout?: TokenLayout;
  hiragana: boolean;
  userDict?: string;
  debug: boolean;
}

/**
 * Programmatic interface for CLI operations
 * Returns the output string that would be printed to stdout
 */
export function runCli(tokenizer: MorphTokenizer, input: string, options: CliOptions = {}): string {
  const format = options.format ?? 'text';
  const analyzer = new FuriganaAnalyzer({ tokenizer, layout: options.layout });

  const result = analyzer.analyze({ text: input, userDictCsv: options.userDictCsv });
  if (!result.ok) {
    throw result.error;
  }

  if (format === 'json') {
    return serializeTokens(result.tokens, analyzer.layout);
  }
  return render(result.tokens, format, { hiragana: options.hiragana });
}

export function createProgram(): Command {
  return new Command()
    .name('rubify')
    .description('Annotate Japanese text with furigana')
    .usage('[options] [input...]')
    .version('0.1.0')
    .argument('[input...]', 'text to annotate (read from stdin when omitted)')
    .addOption(new Option('-f, --format <format>', 'output format').choices(OUTPUT_FORMATS).default('text'))
    .addOption(new Option('-l, --layout <layout>', 'token layout for json output').choices(TOKEN_LAYOUTS))
    .option('-u, --user-dict <file>', 'CSV user dictionary')
    .option('--hiragana', 'show readings in hiragana', false)
    .option('-d, --debug', 'print debug logging', false)
    .helpOption('-h, --help', 'print this help text');
}

function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'text' || value === 'html' || value === 'json';
}

export function parseCliArgs(argv: readonly string[]): ParsedArgs {
  const program = createProgram();
  program.parse([...argv], { from: 'user' });

  const options = program.opts();
  const format: unknown = options.format;
  const layout: unknown = options.layout;
  const userDict: unknown = options.userDict;

  return {
    input: program.args.join(' '),
    format: isOutputFormat(format) ? format : 'text',
    layout: typeof layout === 'string' && isTokenLayout(layout) ? layout : undefined,
    hiragana: options.hiragana === true,
    userDict: typeof userDict === 'string' ? userDict : undefined,
    debug: options.debug === true
  };
}

function readStdin(): string {
  return process.stdin.isTTY ? '' : readFileSync(0, 'utf-8');
}

async function main(): Promise<void> {
  config();
  const env = getConfigFromEnv();
  const args = parseCliArgs(process.argv.slice(2));

  setDebug(env.debug || args.debug);

  const userDictPath = args.userDict ?? env.userDictPath;
  const userDictCsv = userDictPath ? readFileSync(userDictPath, 'utf-8') : undefined;
  const input = args.input || readStdin();

  const tokenizer = await loadKuromojiTokenizer(env.dictPath);
  const output = runCli(tokenizer, input, {
    format: args.format,
    layout: args.layout ?? env.layout,
    hiragana: args.hiragana,
    userDictCsv
  });
  process.stdout.write(output);
  process.stdout.write('\n');

  printPerfCountersAndReset();
}

// Run main if this is the entry point
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error) => {
    console.error(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(2);
  });
}
