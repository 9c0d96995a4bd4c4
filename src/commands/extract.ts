import { parseArgs } from 'util';
import { getEnvironment } from '../config/environment';
import type { Environment } from '../config/environment';
import { isHttpUrl } from '../utils/urlValidator';
import { formatArticle, isOutputFormat } from '../utils/articleFormatter';
import type { OutputFormat } from '../utils/articleFormatter';
import { extractArticle } from '../core/content/htmlContentExtractor';
import type { ResultCache } from '../core/cache/resultCache';
import type { ExtractionOptionsInput } from '../core/content/types/extraction';

export interface CliValues {
  help?: boolean;
  version?: boolean;
  verbose?: boolean;
  file?: string;
  url?: string;
  output?: string;
  'min-words'?: string;
  'max-chars'?: string;
  lang?: string;
  'no-images'?: boolean;
  'no-code'?: boolean;
}

export interface CliIO {
  readStdin: () => Promise<string>;
  readFile: (path: string) => Promise<string>;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export function parseCliArgs(args: string[]): { values: CliValues; positionals: string[] } {
  try {
    return parseArgs({
      args,
      options: {
        help: { type: 'boolean', short: 'h' },
        version: { type: 'boolean' },
        verbose: { type: 'boolean', short: 'v' },
        file: { type: 'string', short: 'f' },
        url: { type: 'string' },
        output: { type: 'string', short: 'o' },
        'min-words': { type: 'string' },
        'max-chars': { type: 'string' },
        lang: { type: 'string' },
        'no-images': { type: 'boolean' },
        'no-code': { type: 'boolean' },
      },
      allowPositionals: true,
    });
  } catch (error) {
    throw new CliUsageError(error instanceof Error ? error.message : 'Invalid command line arguments');
  }
}

function parseCount(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value.trim())) {
    throw new CliUsageError(`${flag} must be a non-negative integer, got "${value}"`);
  }
  return Number(value.trim());
}

export function buildExtractionOptions(values: CliValues, env: Environment): ExtractionOptionsInput {
  const languageHint = values.lang?.trim();
  return {
    minWordCount: parseCount(values['min-words'], '--min-words') ?? env.PAGE_DISTILL_MIN_WORD_COUNT,
    maxOutputChars: parseCount(values['max-chars'], '--max-chars') ?? env.PAGE_DISTILL_MAX_OUTPUT_CHARS,
    includeImages: !values['no-images'],
    includeCode: !values['no-code'],
    ...(languageHint ? { languageHint } : {}),
  };
}

export function resolveOutputFormat(value: string | undefined): OutputFormat {
  const format = value ?? 'json';
  if (!isOutputFormat(format)) {
    throw new CliUsageError(`--output must be one of json, markdown, text; got "${format}"`);
  }
  return format;
}

/**
 * Runs `extract`; returns the process exit code. `cache` follows
 * extractArticle: omitted uses the process-wide cache, `null` bypasses it.
 */
export async function runExtract(
  values: CliValues,
  io: CliIO,
  env: Environment = getEnvironment(),
  cache?: ResultCache | null
): Promise<number> {
  const format = resolveOutputFormat(values.output);
  const options = buildExtractionOptions(values, env);
  if (values.url !== undefined && !isHttpUrl(values.url)) {
    throw new CliUsageError(`--url must be an absolute http(s) URL, got "${values.url}"`);
  }

  const html = values.file ? await io.readFile(values.file) : await io.readStdin();
  const result = await extractArticle(html, {
    url: values.url,
    options,
    ...(cache !== undefined && { cache }),
  });

  if (!result.success) {
    io.stderr(`Error: ${result.error ?? 'extraction failed'}`);
    return 1;
  }
  io.stdout(formatArticle(result, format));
  return 0;
}
