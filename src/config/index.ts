/**
 * Runtime configuration: environment variables (validated with zod) for the pipeline,
 * plus a YAML file for the inclusion thesis and the named sources.
 *
 * The application refuses to start on invalid configuration.
 */

import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';

const Flag = (fallback: '0' | '1') => z.enum(['0', '1']).default(fallback).transform(v => v === '1');
const Optional = z.string().trim().min(1).optional().catch(undefined);

const EnvSchema = z.object({
    SEARCH_PROVIDER: z.enum(['google_cse', 'serpapi', 'serper']).default('google_cse'),
    GOOGLE_CSE_API_KEY: Optional,
    GOOGLE_CSE_CX: Optional,
    SERPAPI_API_KEY: Optional,
    SERPER_API_KEY: Optional,
    SEARCH_EXTRA_QUERY: Flag('0'),
    SEARCH_DEBUG: Flag('0'),
    SEARCH_CACHE_PATH: z.string().default('.search_cache.json'),
    SEARCH_PHASE_TIMEOUT_SECS: z.coerce.number().positive().default(6),

    MIN_RESOLVER_SCORE: z.coerce.number().default(35),
    PER_COMPANY_BUDGET_SECS: z.coerce.number().positive().default(15),
    RESOLVER_BUDGET_FRACTION: z.coerce.number().gt(0).lt(1).default(0.65),
    URL_CHECK_TIMEOUT_SECS: z.coerce.number().positive().default(10),
    MIN_STAGE_BUDGET_SECS: z.coerce.number().positive().default(1),
    DEADLINE_MODE: z.enum(['hard', 'soft']).default('hard'),
    ALLOW_HTTP: Flag('0'),
    DROP_DEAD_LINKS: Flag('1'),

    ENABLE_GPT: Flag('1'),
    OPENAI_API_KEY: Optional,
    OPENAI_MODEL: z.string().default('gpt-4o-mini'),
    GPT_INCLUSION_MODE: z.string().trim().toLowerCase().default('balanced')
        .transform((v): 'strict' | 'balanced' => (v === 'strict' ? 'strict' : 'balanced')),
    CLASSIFIER_TIMEOUT_SECS: z.coerce.number().positive().default(20),

    MAX_COMPANIES: z.coerce.number().int().positive().optional(),
    SINK_BATCH_SIZE: z.coerce.number().int().positive().default(50),
    OUTPUT_CSV: Optional,
    ENTITY_DELAY_MS: z.coerce.number().int().min(0).default(30),

    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    LOG_DIR: Optional,
});

const SourceSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('csv'),
        path: z.string().min(1),
        name_column: z.string().optional(),
        blacklist_domains: z.array(z.string()).default([]),
        max_listings: z.number().int().positive().optional(),
    }),
    z.object({
        type: z.literal('directory_page'),
        url: z.string().url(),
        name_selector: z.string().optional(),
        fallback_selectors: z.array(z.string()).default([]),
        blacklist_domains: z.array(z.string()).default([]),
        max_listings: z.number().int().positive().optional(),
    }),
]);

const FileSchema = z.object({
    search_thesis: z.record(z.unknown()).default({}),
    sources: z.record(SourceSchema).default({}),
});

export type SourceConfig = z.infer<typeof SourceSchema>;

export interface AppConfig {
    search: {
        provider: 'google_cse' | 'serpapi' | 'serper';
        googleCseApiKey?: string;
        googleCseCx?: string;
        serpApiKey?: string;
        serperApiKey?: string;
        extraQuery: boolean;
        debug: boolean;
        cachePath: string;
        phaseTimeoutMs: number;
    };
    pipeline: {
        minResolverScore: number;
        perEntityBudgetSecs: number;
        resolverBudgetFraction: number;
        maxLivenessTimeoutSecs: number;
        minStageBudgetSecs: number;
        deadlineMode: 'hard' | 'soft';
        allowHttp: boolean;
        dropDeadLinks: boolean;
        sinkBatchSize: number;
        entityDelayMs: number;
        maxCompanies?: number;
    };
    classifier: {
        enabled: boolean;
        apiKey?: string;
        model: string;
        mode: 'balanced' | 'strict';
        timeoutMs: number;
    };
    outputCsv?: string;
    logging: { level: string; dir?: string };
    searchThesis: Record<string, unknown>;
    sources: Record<string, SourceConfig>;
}

export const DEFAULT_CONFIG_PATH = [
    path.join(__dirname, 'default.yaml'),
    path.resolve(__dirname, '../../../src/config/default.yaml'),
].find(p => fs.existsSync(p)) ?? path.join(__dirname, 'default.yaml');

function describeIssues(error: z.ZodError): string[] {
    return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export function loadConfig(options: { env?: NodeJS.ProcessEnv; configPath?: string } = {}): AppConfig {
    const envResult = EnvSchema.safeParse(options.env ?? process.env);
    if (!envResult.success) {
        const issues = describeIssues(envResult.error);
        throw new ConfigurationError(`Invalid environment configuration:\n  - ${issues.join('\n  - ')}`, issues);
    }
    const env = envResult.data;

    const configPath = options.configPath ?? DEFAULT_CONFIG_PATH;
    let fileContents: unknown;
    try {
        fileContents = yaml.load(fs.readFileSync(configPath, 'utf8'));
    } catch (e) {
        throw new ConfigurationError(`Cannot read config file ${configPath}: ${e instanceof Error ? e.message : String(e)}`);
    }
    const fileResult = FileSchema.safeParse(fileContents ?? {});
    if (!fileResult.success) {
        const issues = describeIssues(fileResult.error);
        throw new ConfigurationError(`Invalid config file ${configPath}:\n  - ${issues.join('\n  - ')}`, issues);
    }

    if (env.ENABLE_GPT && !env.OPENAI_API_KEY) {
        throw new ConfigurationError('OPENAI_API_KEY not set while ENABLE_GPT=1', ['OPENAI_API_KEY: required']);
    }

    return {
        search: {
            provider: env.SEARCH_PROVIDER,
            googleCseApiKey: env.GOOGLE_CSE_API_KEY,
            googleCseCx: env.GOOGLE_CSE_CX,
            serpApiKey: env.SERPAPI_API_KEY,
            serperApiKey: env.SERPER_API_KEY,
            extraQuery: env.SEARCH_EXTRA_QUERY,
            debug: env.SEARCH_DEBUG,
            cachePath: path.resolve(env.SEARCH_CACHE_PATH),
            phaseTimeoutMs: env.SEARCH_PHASE_TIMEOUT_SECS * 1000,
        },
        pipeline: {
            minResolverScore: env.MIN_RESOLVER_SCORE,
            perEntityBudgetSecs: env.PER_COMPANY_BUDGET_SECS,
            resolverBudgetFraction: env.RESOLVER_BUDGET_FRACTION,
            maxLivenessTimeoutSecs: env.URL_CHECK_TIMEOUT_SECS,
            minStageBudgetSecs: env.MIN_STAGE_BUDGET_SECS,
            deadlineMode: env.DEADLINE_MODE,
            allowHttp: env.ALLOW_HTTP,
            dropDeadLinks: env.DROP_DEAD_LINKS,
            sinkBatchSize: env.SINK_BATCH_SIZE,
            entityDelayMs: env.ENTITY_DELAY_MS,
            maxCompanies: env.MAX_COMPANIES,
        },
        classifier: {
            enabled: env.ENABLE_GPT,
            apiKey: env.OPENAI_API_KEY,
            model: env.OPENAI_MODEL,
            mode: env.GPT_INCLUSION_MODE,
            timeoutMs: env.CLASSIFIER_TIMEOUT_SECS * 1000,
        },
        outputCsv: env.OUTPUT_CSV,
        logging: { level: env.LOG_LEVEL, dir: env.LOG_DIR },
        searchThesis: fileResult.data.search_thesis,
        sources: fileResult.data.sources,
    };
}
