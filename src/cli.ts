#!/usr/bin/env node
import 'dotenv/config';
import path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig } from './config';
import { ResolutionCache } from './modules/cache/resolution-cache';
import { logger } from './modules/observability';
import { PreviewSink } from './modules/sink';
import { prepareRun } from './pipeline/bootstrap';
import { SkippedDisposition } from './types';
import { EnricherError, SinkFailureError } from './utils/errors';

const program = new Command();

function positiveInt(value: string): number {
    const n = Number.parseInt(value, 10);
    if (!Number.isFinite(n) || n <= 0) throw new InvalidArgumentError('Must be a positive integer.');
    return n;
}

function fail(error: unknown): never {
    if (error instanceof SinkFailureError) {
        logger.error(`Fatal: ${error.message}`, {
            processed: error.dispositions.length,
            unwrittenRows: error.pendingRows.length,
        });
    } else if (error instanceof EnricherError) {
        logger.error(`Fatal: ${error.message}`, { code: error.code });
    } else {
        logger.logError('Fatal error', error);
    }
    process.exit(1);
}

program
    .name('enrich')
    .description('Resolve, validate and classify company websites from a directory listing')
    .version('1.0.0');

program
    .command('run')
    .description('Process one configured source')
    .argument('<source>', 'Source key from the config file')
    .option('-m, --max <n>', 'Process at most n companies', positiveInt)
    .option('-c, --config <path>', 'Path to a config YAML')
    .option('-o, --output <path>', 'Append accepted rows to this CSV file')
    .action(async (sourceKey: string, options: { max?: number; config?: string; output?: string }) => {
        try {
            const config = loadConfig({ configPath: options.config ? path.resolve(options.config) : undefined });
            logger.setLevel(config.logging.level);
            if (config.logging.dir) logger.enableFileLogging(config.logging.dir);

            const run = prepareRun(config, sourceKey, { maxItems: options.max, outputCsv: options.output });
            const { summary, dispositions } = await run.pipeline.run(run.source.companies(run.maxItems), {
                sourceKey,
                maxItems: run.maxItems,
            });

            if (run.sink instanceof PreviewSink) {
                const skipped = dispositions.filter((d): d is SkippedDisposition => d.kind === 'skipped');
                run.sink.report(skipped);
            }
            logger.info('=== SUMMARY ===');
            logger.info(JSON.stringify(summary, null, 2));
        } catch (e) {
            fail(e);
        }
    });

program
    .command('cache:clear')
    .description('Forget the cached resolution for one company name')
    .argument('<name>', 'Exact company name as it was cached')
    .option('--cache <path>', 'Cache file', process.env.SEARCH_CACHE_PATH || '.search_cache.json')
    .action((name: string, options: { cache: string }) => {
        const cache = new ResolutionCache(path.resolve(options.cache));
        if (cache.delete(name)) {
            logger.info(`Removed "${name}" from ${options.cache}`);
        } else {
            logger.info(`"${name}" was not cached`);
        }
    });

program.parseAsync(process.argv).catch(fail);
