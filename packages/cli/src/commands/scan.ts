/**
 * tokenscan scan command
 *
 * Prints the tokens of a file, or of standard input when no file is given.
 * A regex literal is scanned after `=~` and `!~`.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { createLogger, isEnvironment, type Logger, type LogLevel } from '@tokenscan/logger';
import {
  createVocabulary,
  isErrorToken,
  Scanner,
  TokenType,
  type KeywordEntries,
  type RuneSource,
  type ScannerOptions,
  type Token,
  type TokenKind,
} from '@tokenscan/scanner';
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig, loadKeywordFile, mergeKeywords } from '../config.js';
import { formatSummary, formatToken, isOutputFormat, type OutputFormat } from '../format.js';

export const EXIT_OK = 0;
/** --strict found at least one error token */
export const EXIT_ERROR_TOKENS = 1;
/** Bad usage, unreadable input or invalid configuration */
export const EXIT_FAILURE = 2;

export interface ScanCommandOptions {
  format: OutputFormat;
  skipWs?: boolean;
  keywords?: string;
  strict?: boolean;
  color?: boolean;
}

/** Process streams and environment, replaceable in tests */
export interface ScanIO {
  cwd: string;
  env: Record<string, string | undefined>;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  readStdin: () => Promise<Iterable<string>>;
}

export interface ScanSourceOptions extends ScannerOptions {
  skipWhitespace?: boolean;
}

const REGEX_OPERATORS: ReadonlySet<TokenKind> = new Set<TokenKind>([TokenType.EQREGEX, TokenType.NEQREGEX]);

/**
 * Scan a source to EOF, switching to regex scanning after a regex operator
 */
export function scanSource(source: RuneSource, options: ScanSourceOptions = {}): Token[] {
  const scanner = new Scanner(source, options);
  const tokens: Token[] = [];
  let previous: TokenKind = TokenType.EOF;

  for (;;) {
    const token = REGEX_OPERATORS.has(previous) ? scanner.scanRegex() : scanner.scan();
    if (token.type !== TokenType.WS) {
      previous = token.type;
    } else if (options.skipWhitespace) {
      continue;
    }

    tokens.push(token);
    if (token.type === TokenType.EOF) {
      return tokens;
    }
  }
}

function toKeywordEntries(keywords: Record<string, number>): KeywordEntries {
  return new Map(Object.entries(keywords).map(([name, kind]): [TokenKind, string] => [kind, name]));
}

function createCommandLogger(io: ScanIO, minLevel?: LogLevel): Logger {
  const environment = io.env.TOKENSCAN_ENV;
  return createLogger({
    environment: isEnvironment(environment) ? environment : 'development',
    minLevel,
    sink: io.stderr,
  }).child({ command: 'scan' });
}

/**
 * Run the scan command and return its exit code
 */
export async function runScan(file: string | undefined, options: ScanCommandOptions, io: ScanIO): Promise<number> {
  const input = file ?? '<stdin>';
  let logger = createCommandLogger(io);

  try {
    const { config, path: configPath } = loadConfig(io.cwd);
    if (config.logLevel) {
      logger = createCommandLogger(io, config.logLevel);
    }
    logger.debug('config_loaded', { path: configPath });

    const keywordFile = options.keywords ? path.resolve(io.cwd, options.keywords) : null;
    const keywords = keywordFile
      ? mergeKeywords(config.keywords, loadKeywordFile(keywordFile), keywordFile)
      : config.keywords;
    const vocabulary = createVocabulary(toKeywordEntries(keywords), { logger });

    const source = file ? fs.readFileSync(path.resolve(io.cwd, file), 'utf-8') : await io.readStdin();
    const tokens = scanSource(source, {
      vocabulary,
      regexEscapes: config.regexEscapes,
      logger,
      skipWhitespace: options.skipWs === true || config.skipWhitespace,
    });

    for (const token of tokens) {
      io.stdout(formatToken(token, vocabulary, options));
    }

    const errors = tokens.filter((token) => isErrorToken(token.type)).length;
    if (options.format === 'pretty') {
      io.stdout(formatSummary(tokens.length, errors, options.color ?? true));
    }
    logger.debug('scan_completed', { input, tokens: tokens.length, errors });

    return options.strict && errors > 0 ? EXIT_ERROR_TOKENS : EXIT_OK;
  } catch (error) {
    logger.error('scan_failed', { input, error });
    return EXIT_FAILURE;
  }
}

async function readStdin(): Promise<string[]> {
  const chunks: string[] = [];
  process.stdin.setEncoding('utf-8');
  for await (const chunk of process.stdin) {
    chunks.push(String(chunk));
  }
  return chunks;
}

function processIO(): ScanIO {
  return {
    cwd: process.cwd(),
    env: process.env,
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
    readStdin,
  };
}

export function parseFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new InvalidArgumentError('Expected pretty or json.');
  }
  return value;
}

export const scanCommand = new Command('scan')
  .description('Print the tokens of a file or of standard input')
  .argument('[file]', 'File to scan (standard input when omitted)')
  .option('--format <type>', 'Output format: pretty, json', parseFormat, 'pretty')
  .option('--skip-ws', 'Leave whitespace tokens out')
  .option('--keywords <file>', 'JSON file of extra keywords, name to token kind')
  .option('--strict', 'Exit with 1 when any error token is found')
  .option('--no-color', 'Disable colored output')
  .exitOverride((error) => {
    process.exit(error.exitCode === 0 ? 0 : EXIT_FAILURE);
  })
  .action(async (file: string | undefined, options: ScanCommandOptions) => {
    process.exitCode = await runScan(file, options, processIO());
  });
