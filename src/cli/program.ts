import { Command, InvalidArgumentError } from 'commander';
import { AffiliationClassifier } from '../classifier/affiliation-classifier.js';
import { formatPapersCsv, savePapersCsv } from '../exporters/csv-export.js';
import { renderStatistics } from '../exporters/report.js';
import { runPipeline } from '../pipeline/paper-pipeline.js';
import type { PharmaPapersConfig } from '../types/index.js';
import { resolveConfig } from '../utils/config.js';
import { describeError } from '../utils/http-client.js';
import { getLogger, initLogger } from '../utils/logger.js';

export const VERSION = '0.1.0';

export interface CliOptions {
    debug?: boolean;
    file?: string;
    maxResults?: number;
    batchSize?: number;
    email?: string;
    apiKey?: string;
    stats?: boolean;
    jsonLogs?: boolean;
}

const EPILOG = `
Examples:
  $ get-papers-list "cancer drug development"
  $ get-papers-list "SARS-CoV-2 vaccine" --file results.csv --debug
  $ get-papers-list '"machine learning"[Title] AND "drug discovery"[MeSH Terms]'

The query is passed to PubMed unchanged, so Boolean operators, field tags,
wildcards and quoted phrases all work.`;

export function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
}

/**
 * Map parsed CLI options onto config flags. Unset options stay undefined so
 * env vars and the config file can supply them.
 */
export function toConfigFlags(query: string, opts: CliOptions): Partial<PharmaPapersConfig> {
    return {
        query,
        file: opts.file,
        maxResults: opts.maxResults,
        batchSize: opts.batchSize,
        email: opts.email,
        apiKey: opts.apiKey,
        stats: opts.stats || undefined,
        jsonLogs: opts.jsonLogs || undefined,
        logLevel: opts.debug ? 'debug' : undefined,
    };
}

/**
 * Run one query end to end and return the process exit code.
 */
export async function runQuery(config: PharmaPapersConfig): Promise<number> {
    const logger = getLogger();
    const classifier = new AffiliationClassifier();

    try {
        const { response, papers, filtered } = await runPipeline(config, undefined, classifier);

        if (!response.success) {
            logger.error({ error: response.error_message }, 'Failed to fetch papers');
            return 1;
        }

        if (papers.length === 0) {
            logger.info('No papers found matching the query.');
            return 0;
        }

        if (filtered.length === 0) {
            logger.info('No papers found with pharmaceutical/biotech company affiliations.');
            return 0;
        }

        if (config.file) {
            savePapersCsv(filtered, config.file);
        } else {
            process.stdout.write(formatPapersCsv(filtered));
        }

        if (config.stats) {
            process.stdout.write(renderStatistics(papers, classifier));
        }

        return 0;
    } catch (error) {
        logger.error({ error: describeError(error) }, 'An error occurred');
        logger.debug({ error }, 'Stack trace');
        return 1;
    }
}

export function createProgram(): Command {
    const program = new Command();

    program
        .name('get-papers-list')
        .description('Fetch research papers from PubMed and identify pharmaceutical/biotech company affiliations.')
        .version(VERSION)
        .argument('<query>', 'Search query in PubMed format')
        .option('-d, --debug', 'Print debug information during execution')
        .option('-f, --file <path>', 'Save results to this CSV file instead of printing them')
        .option('--max-results <n>', 'Maximum number of results to retrieve (default: 10000)', parsePositiveInt)
        .option('--batch-size <n>', 'Records per fetch request for large result sets (default: 100)', parsePositiveInt)
        .option('--email <email>', 'Email address for NCBI API identification (recommended)')
        .option('--api-key <key>', 'NCBI API key for increased rate limits')
        .option('--stats', 'Display statistics about the search results')
        .option('--json-logs', 'Output JSON logs')
        .addHelpText('after', EPILOG)
        .action(async (query: string, opts: CliOptions) => {
            const config = await resolveConfig(toConfigFlags(query, opts));
            initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
            process.exitCode = await runQuery(config);
        });

    return program;
}
