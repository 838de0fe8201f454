import path from 'path';
import { AppConfig, SourceConfig } from '../config';
import { Classifier, RowSink } from '../types';
import { ResolutionCache } from '../modules/cache/resolution-cache';
import { LlmClassifier, OpenAICompletionClient, PassThroughClassifier } from '../modules/classifier';
import { DeadlineManager } from '../modules/deadline';
import { CompanySource, CsvCompanySource, DirectoryPageSource } from '../modules/ingestor';
import { logger } from '../modules/observability';
import { WebsiteResolver } from '../modules/resolver';
import { DEFAULT_HTTP_OPTIONS, SearchFactory } from '../modules/search/provider';
import { CsvRowSink, PreviewSink } from '../modules/sink';
import { LinkValidator } from '../modules/validity';
import { ConfigurationError } from '../utils/errors';
import { Pipeline } from './index';

export interface PreparedRun {
    pipeline: Pipeline;
    source: CompanySource;
    sink: RowSink;
    maxItems?: number;
}

export function createSource(key: string, source: SourceConfig): CompanySource {
    switch (source.type) {
        case 'csv':
            return new CsvCompanySource(key, path.resolve(source.path), source.name_column);
        case 'directory_page':
            return new DirectoryPageSource(key, {
                url: source.url,
                nameSelector: source.name_selector,
                fallbackSelectors: source.fallback_selectors,
            });
    }
}

export function createClassifier(config: AppConfig): Classifier {
    const { enabled, apiKey, model, mode, timeoutMs } = config.classifier;
    if (!enabled) {
        logger.info('[Bootstrap] Classifier disabled, every live site passes as "TBD"');
        return new PassThroughClassifier();
    }
    if (!apiKey) {
        throw new ConfigurationError('OPENAI_API_KEY not set while ENABLE_GPT=1', ['OPENAI_API_KEY: required']);
    }
    return new LlmClassifier(new OpenAICompletionClient(apiKey, model, timeoutMs), config.searchThesis, mode);
}

/**
 * Wires one run of a configured source. `outputCsv` (or OUTPUT_CSV) selects a
 * persistent CSV sink; without it rows only go to the preview.
 */
export function prepareRun(config: AppConfig, sourceKey: string, overrides: { maxItems?: number; outputCsv?: string } = {}): PreparedRun {
    const sourceConfig = config.sources[sourceKey];
    if (!sourceConfig) {
        const known = Object.keys(config.sources).join(', ') || '(none)';
        throw new ConfigurationError(`Unknown source "${sourceKey}". Configured sources: ${known}`, [`sources.${sourceKey}: not found`]);
    }

    const provider = SearchFactory.create(config.search, {
        ...DEFAULT_HTTP_OPTIONS,
        phaseTimeoutMs: config.search.phaseTimeoutMs,
    });
    const cache = new ResolutionCache(config.search.cachePath);
    const resolver = new WebsiteResolver(provider, cache, {
        extraQuery: config.search.extraQuery,
        debug: config.search.debug,
    });

    const outputCsv = overrides.outputCsv ?? config.outputCsv;
    const sink: RowSink = outputCsv ? new CsvRowSink(path.resolve(outputCsv)) : new PreviewSink();

    const p = config.pipeline;
    const pipeline = new Pipeline({
        resolver,
        validator: new LinkValidator({ allowHttp: p.allowHttp }),
        classifier: createClassifier(config),
        sink,
        deadlines: new DeadlineManager(p.deadlineMode),
    }, {
        minResolverScore: p.minResolverScore,
        perEntityBudgetSecs: p.perEntityBudgetSecs,
        resolverBudgetFraction: p.resolverBudgetFraction,
        maxLivenessTimeoutSecs: p.maxLivenessTimeoutSecs,
        minStageBudgetSecs: p.minStageBudgetSecs,
        dropDeadLinks: p.dropDeadLinks,
        blacklistDomains: sourceConfig.blacklist_domains,
        sinkBatchSize: p.sinkBatchSize,
        entityDelayMs: p.entityDelayMs,
    });

    logger.info(`[Bootstrap] Source=${sourceKey} provider=${provider.name} deadline=${p.deadlineMode} sink=${outputCsv ?? 'preview'}`);

    const caps = [overrides.maxItems, p.maxCompanies, sourceConfig.max_listings].filter((n): n is number => n !== undefined);
    return {
        pipeline,
        source: createSource(sourceKey, sourceConfig),
        sink,
        maxItems: caps.length > 0 ? Math.min(...caps) : undefined,
    };
}
