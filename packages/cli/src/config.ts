/**
 * CLI configuration loading
 *
 * Reads tokenscan.config.json, searching from the current directory
 * up to the filesystem root.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { CUSTOM_TOKEN_START } from '@tokenscan/scanner';
import { z } from 'zod';

export const CONFIG_FILE = 'tokenscan.config.json';

/** Keyword name to token kind; each kind and each lower-cased name used once */
export const keywordsSchema = z
  .record(
    z.string().min(1, 'Keyword name is required'),
    z.number().int().min(CUSTOM_TOKEN_START, `Custom token kinds start at ${CUSTOM_TOKEN_START}`),
  )
  .superRefine((keywords, ctx) => {
    const namesByKind = new Map<number, string>();
    const lowered = new Set<string>();

    for (const [name, kind] of Object.entries(keywords)) {
      const previous = namesByKind.get(kind);
      if (previous !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [name],
          message: `Token kind ${kind} is already used by "${previous}"`,
        });
      }
      if (lowered.has(name.toLowerCase())) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [name],
          message: 'Keyword names are case-insensitive and must be unique',
        });
      }
      namesByKind.set(kind, name);
      lowered.add(name.toLowerCase());
    }
  });

export const configSchema = z
  .object({
    keywords: keywordsSchema.default({}),
    skipWhitespace: z.boolean().default(false),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).optional(),
    regexEscapes: z.enum(['strict', 'passthrough']).default('strict'),
  })
  .strict();

export type TokenscanConfig = z.infer<typeof configSchema>;

export interface LoadedConfig {
  config: TokenscanConfig;
  /** File the config came from; null when defaults were used */
  path: string | null;
}

export class ConfigError extends Error {
  readonly file: string;

  constructor(message: string, file: string) {
    super(`${file}: ${message}`);
    this.name = 'ConfigError';
    this.file = file;
  }
}

/**
 * Find tokenscan.config.json, searching from startDir up to root
 */
export function findConfigFile(startDir: string): string | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const configPath = path.join(currentDir, CONFIG_FILE);
    if (fs.existsSync(configPath)) {
      return configPath;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached filesystem root
      return null;
    }
    currentDir = parentDir;
  }
}

function readJson(file: string): unknown {
  const content = fs.readFileSync(file, 'utf-8');
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid JSON (${error instanceof Error ? error.message : String(error)})`, file);
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Load the nearest config file, or defaults when there is none
 */
export function loadConfig(cwd: string = process.cwd()): LoadedConfig {
  const file = findConfigFile(cwd);
  if (!file) {
    return { config: configSchema.parse({}), path: null };
  }

  const result = configSchema.safeParse(readJson(file));
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error), file);
  }
  return { config: result.data, path: file };
}

/**
 * Load a keyword file given with --keywords: a JSON object of name to kind
 */
export function loadKeywordFile(file: string): Record<string, number> {
  const result = keywordsSchema.safeParse(readJson(file));
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error), file);
  }
  return result.data;
}

/**
 * Add the keywords of a --keywords file to the configured ones. Names and
 * kinds must stay unique across both.
 */
export function mergeKeywords(
  base: Record<string, number>,
  extra: Record<string, number>,
  file: string,
): Record<string, number> {
  const result = keywordsSchema.safeParse({ ...base, ...extra });
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error), file);
  }
  return result.data;
}
