import { z } from 'zod';
import type { CrawlGraphConfig } from '../types.js';
import { CONFIG_DEFAULTS } from '../types.js';

/**
 * Config as accepted from users: `urls` plus any subset of the rest.
 */
export type UserCrawlGraphConfig = Partial<CrawlGraphConfig> & { urls: string[] };

const nonEmptyString = z.string().trim().min(1, 'must be a non-empty string');

/**
 * Schema for the data fields of a user config. Callbacks are not checked.
 */
export const userConfigSchema = z.object({
  urls: z.array(nonEmptyString),
  allowedDomains: z.array(nonEmptyString).optional(),
  restrictToDomain: z.boolean().optional(),
  maxDepth: z.number().int().nonnegative().optional(),
  maxResults: z.number().int().positive().optional(),
  canonicalizeUrls: z.boolean().optional(),
  includePatterns: z.array(z.string()).optional(),
  excludePatterns: z.array(z.string()).optional(),
  outputFile: nonEmptyString.optional(),
  outputFormat: z.enum(['json', 'dot']).optional(),
  delay: z.number().nonnegative().optional(),
  concurrency: z.number().int().positive().optional(),
  timeout: z.number().positive().optional(),
  adaptiveRateLimit: z.boolean().optional(),
  headers: z.record(z.string()).optional(),
  markdownDir: nonEmptyString.optional(),
});

/**
 * Validate the user config and throw an error naming the first bad field.
 */
export function validateConfig(userConfig: UserCrawlGraphConfig): void {
  const parsed = userConfigSchema.safeParse(userConfig);
  if (parsed.success) {
    return;
  }
  const issue = parsed.error.issues[0];
  const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
  throw new Error(`crawlGraph: ${path}: ${issue.message}`);
}

/**
 * Merge user config over CONFIG_DEFAULTS. A user value wins unless it is
 * `undefined`, which keeps the default.
 */
export function mergeDefaults(userConfig: UserCrawlGraphConfig): CrawlGraphConfig {
  return {
    ...userConfig,
    allowedDomains: userConfig.allowedDomains ?? CONFIG_DEFAULTS.allowedDomains,
    restrictToDomain: userConfig.restrictToDomain ?? CONFIG_DEFAULTS.restrictToDomain,
    maxDepth: userConfig.maxDepth ?? CONFIG_DEFAULTS.maxDepth,
    canonicalizeUrls: userConfig.canonicalizeUrls ?? CONFIG_DEFAULTS.canonicalizeUrls,
    outputFormat: userConfig.outputFormat ?? CONFIG_DEFAULTS.outputFormat,
    delay: userConfig.delay ?? CONFIG_DEFAULTS.delay,
    concurrency: userConfig.concurrency ?? CONFIG_DEFAULTS.concurrency,
    timeout: userConfig.timeout ?? CONFIG_DEFAULTS.timeout,
    adaptiveRateLimit: userConfig.adaptiveRateLimit ?? CONFIG_DEFAULTS.adaptiveRateLimit,
  };
}

/**
 * Validate and merge the user config into a full CrawlGraphConfig.
 */
export function validateAndMergeConfig(userConfig: UserCrawlGraphConfig): CrawlGraphConfig {
  validateConfig(userConfig);
  return mergeDefaults(userConfig);
}
