import type { OutputFormat } from '../types.js';
import type { UserCrawlGraphConfig } from '../sdk/config.js';

/**
 * Raw CLI options as parsed by commander.
 */
export interface CLIOptions {
  depth?: string;
  maxResults?: string;
  allowDomain?: string[];
  restrict?: boolean;
  canonicalize?: boolean;
  include?: string[];
  exclude?: string[];
  output?: string;
  format?: string;
  markdown?: string;
  delay?: string;
  concurrency?: string;
  timeout?: string;
  header?: string[];
  verbose?: boolean;
  quiet?: boolean;
  dryRun?: boolean;
}

const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'dot'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Parse --header values from "key:value" format into a Record.
 * Splits on the first colon so values may contain colons.
 *
 * @throws Error if a header has no colon or an empty name
 */
export function parseHeaders(headers: string[]): Record<string, string> {
  const result: Record<string, string> = {};

  for (const header of headers) {
    const colonIndex = header.indexOf(':');
    if (colonIndex === -1) {
      throw new Error(
        `Invalid header format: "${header}". Expected "key:value" format.`,
      );
    }
    const key = header.slice(0, colonIndex).trim();
    if (!key) {
      throw new Error(
        `Invalid header format: "${header}". Header name cannot be empty.`,
      );
    }
    result[key] = header.slice(colonIndex + 1).trim();
  }

  return result;
}

/**
 * Parse a numeric option value.
 *
 * @throws Error if the value is not an integer
 */
export function parseIntegerOption(name: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new Error(`Invalid value for --${name}: "${value}". Expected an integer.`);
  }
  return parsed;
}

/**
 * Build a crawl config from the positional seed URLs and parsed options.
 *
 * Only sets properties the user provided; the SDK's default merging
 * handles the rest.
 */
export function buildConfig(urls: string[], options: CLIOptions): UserCrawlGraphConfig {
  const config: UserCrawlGraphConfig = { urls };

  // Scope
  if (options.depth !== undefined) {
    config.maxDepth = parseIntegerOption('depth', options.depth);
  }
  if (options.maxResults !== undefined) {
    config.maxResults = parseIntegerOption('max-results', options.maxResults);
  }
  if (options.allowDomain !== undefined && options.allowDomain.length > 0) {
    config.allowedDomains = options.allowDomain;
  }
  // Commander negated option: --no-restrict sets options.restrict to false
  if (options.restrict === false) {
    config.restrictToDomain = false;
  }
  if (options.canonicalize) {
    config.canonicalizeUrls = true;
  }
  if (options.include !== undefined && options.include.length > 0) {
    config.includePatterns = options.include;
  }
  if (options.exclude !== undefined && options.exclude.length > 0) {
    config.excludePatterns = options.exclude;
  }

  // Output
  if (options.output !== undefined) {
    config.outputFile = options.output;
  }
  if (options.format !== undefined) {
    if (!isOutputFormat(options.format)) {
      throw new Error(
        `Invalid format "${options.format}". Must be one of: ${OUTPUT_FORMATS.join(', ')}`,
      );
    }
    config.outputFormat = options.format;
  }
  if (options.markdown !== undefined) {
    config.markdownDir = options.markdown;
  }

  // Fetching
  if (options.delay !== undefined) {
    config.delay = parseIntegerOption('delay', options.delay);
  }
  if (options.concurrency !== undefined) {
    config.concurrency = parseIntegerOption('concurrency', options.concurrency);
  }
  if (options.timeout !== undefined) {
    config.timeout = parseIntegerOption('timeout', options.timeout);
  }
  if (options.header !== undefined && options.header.length > 0) {
    config.headers = parseHeaders(options.header);
  }

  return config;
}
