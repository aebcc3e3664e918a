import { Command } from 'commander';
import { crawlGraph } from '../sdk/index.js';
import { validateAndMergeConfig } from '../sdk/config.js';
import { serializeGraph } from '../output/index.js';
import { CONFIG_DEFAULTS } from '../types.js';
import { buildConfig } from './options.js';
import type { CLIOptions } from './options.js';
import {
  createProgressCallbacks,
  printSummary,
  printDryRun,
  type Verbosity,
} from './progress.js';

/**
 * Accumulate repeated option values into an array.
 * Used for --allow-domain, --header, --include and --exclude.
 */
function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Create and configure the commander program with all CLI options.
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name('webgraph-crawler')
    .description('Crawl pages from seed URLs into a graph of hyperlinks')
    .version('0.1.0')
    .argument('<urls...>', 'Seed URLs to crawl from')

    // Scope
    .option('--depth <n>', 'Max link hops from each seed', String(CONFIG_DEFAULTS.maxDepth))
    .option('--max-results <n>', 'Max nodes in the result graph')
    .option('--allow-domain <domain>', 'Domain allowed for every seed (repeatable)', collect, [])
    .option('--no-restrict', 'Do not restrict each crawl to its seed domain')
    .option('--canonicalize', 'Canonicalize URLs before using them as node ids')
    .option('--include <pattern>', 'Only follow links whose path matches (repeatable)', collect, [])
    .option('--exclude <pattern>', 'Never follow links whose path matches (repeatable)', collect, [])

    // Output
    .option('-o, --output <file>', 'Write the graph to a file instead of stdout')
    .option('-f, --format <format>', 'Output format: json or dot', CONFIG_DEFAULTS.outputFormat)
    .option('--markdown <dir>', 'Also save every fetched page as Markdown in this directory')

    // Fetching
    .option('--delay <ms>', 'Delay between requests in ms', String(CONFIG_DEFAULTS.delay))
    .option('--concurrency <n>', 'Parallel requests', String(CONFIG_DEFAULTS.concurrency))
    .option('--timeout <ms>', 'Request timeout in ms', String(CONFIG_DEFAULTS.timeout))
    .option('--header <key:value>', 'Custom header (repeatable)', collect, [])

    // General
    .option('-v, --verbose', 'Verbose progress output')
    .option('-q, --quiet', 'Suppress output except errors')
    .option('--dry-run', 'Show what would be crawled without fetching');

  return program;
}

function getVerbosity(options: CLIOptions): Verbosity {
  if (options.quiet) return 'quiet';
  if (options.verbose) return 'verbose';
  return 'normal';
}

/**
 * Main CLI entry point. Parses command-line arguments, builds the crawl
 * configuration and runs crawlGraph().
 *
 * @param argv - The process.argv array to parse
 */
export async function run(argv: string[]): Promise<void> {
  const program = createProgram();

  program.action(async (urls: string[], options: CLIOptions) => {
    try {
      if (options.verbose && options.quiet) {
        throw new Error('Cannot use --verbose and --quiet at the same time.');
      }

      const verbosity = getVerbosity(options);
      const config = buildConfig(urls, options);

      if (options.dryRun) {
        printDryRun(validateAndMergeConfig(config));
        process.exit(0);
        return;
      }

      const result = await crawlGraph({ ...config, ...createProgressCallbacks(verbosity) });

      if (!result.outputPath) {
        const format = config.outputFormat ?? CONFIG_DEFAULTS.outputFormat;
        process.stdout.write(serializeGraph(result.graph, format));
      }
      printSummary(result, verbosity);

      process.exit(0);
    } catch (error) {
      process.stderr.write(
        `Error: ${error instanceof Error ? error.message : String(error)}\n`,
      );
      process.exit(1);
    }
  });

  await program.parseAsync(argv);
}
