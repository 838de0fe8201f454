import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { SearchProvider, SearchResult } from '../../types';
import { ProviderUnavailableError } from '../../utils/errors';
import { withRetry } from '../../utils/retry';
import { logger } from '../observability';

export const MAX_RESULTS = 10;

export type ProviderId = 'google_cse' | 'serpapi' | 'serper';

export interface SearchHttpOptions {
    /** Socket inactivity limit, applied to connect and to every read. */
    phaseTimeoutMs: number;
    attempts: number;
    retryDelayMs: number;
    maxRetryTimeMs: number;
}

export const DEFAULT_HTTP_OPTIONS: SearchHttpOptions = {
    phaseTimeoutMs: 6000,
    attempts: 3,
    retryDelayMs: 1000,
    maxRetryTimeMs: 8000,
};

/** No response at all (timeout, reset, refused). Status errors and cancellations are final. */
export function isTransientTransportError(error: unknown): boolean {
    if (axios.isCancel(error)) return false;
    return axios.isAxiosError(error) && error.response === undefined;
}

const Text = z.string().nullish();

abstract class HttpSearchProvider implements SearchProvider {
    abstract readonly name: string;
    protected readonly client: AxiosInstance;

    constructor(protected readonly options: SearchHttpOptions = DEFAULT_HTTP_OPTIONS, client?: AxiosInstance) {
        this.client = client ?? axios.create({
            timeout: options.phaseTimeoutMs,
            headers: { 'User-Agent': 'Mozilla/5.0' },
        });
    }

    async search(query: string, signal?: AbortSignal): Promise<SearchResult[]> {
        try {
            const payload = await withRetry(() => this.request(query, signal), {
                attempts: this.options.attempts,
                delay: this.options.retryDelayMs,
                backoff: 'exponential',
                maxElapsedMs: this.options.maxRetryTimeMs,
                retryCondition: isTransientTransportError,
                signal,
                label: `${this.name} search`,
            });
            return this.parse(payload).slice(0, MAX_RESULTS);
        } catch (e) {
            if (signal?.aborted) {
                logger.debug(`[${this.name}] Search aborted for "${query}"`);
            } else {
                logger.logError(`[${this.name}] Search failed for "${query}"`, e);
            }
            return [];
        }
    }

    protected abstract request(query: string, signal?: AbortSignal): Promise<unknown>;

    /** Throws on a payload that does not match the provider's shape. */
    protected abstract parse(payload: unknown): SearchResult[];
}

const GoogleCsePayload = z.object({
    items: z.array(z.object({ title: Text, link: Text, snippet: Text })).nullish(),
});

export class GoogleCseProvider extends HttpSearchProvider {
    readonly name = 'GoogleCSE';

    constructor(private readonly apiKey: string, private readonly cx: string, options?: SearchHttpOptions, client?: AxiosInstance) {
        super(options, client);
    }

    protected async request(query: string, signal?: AbortSignal): Promise<unknown> {
        const res = await this.client.get('https://www.googleapis.com/customsearch/v1', {
            params: { key: this.apiKey, cx: this.cx, q: query, num: String(MAX_RESULTS) },
            signal,
        });
        return res.data;
    }

    protected parse(payload: unknown): SearchResult[] {
        const data = GoogleCsePayload.parse(payload);
        return (data.items ?? []).map(it => ({
            title: it.title ?? '',
            url: (it.link ?? '').trim(),
            snippet: it.snippet ?? '',
        }));
    }
}

const SerpApiPayload = z.object({
    organic_results: z.array(z.object({
        title: Text,
        link: Text,
        snippet: Text,
        snippet_highlighted_words: z.array(z.string()).nullish(),
    })).nullish(),
});

export class SerpApiProvider extends HttpSearchProvider {
    readonly name = 'SerpAPI';

    constructor(private readonly apiKey: string, options?: SearchHttpOptions, client?: AxiosInstance) {
        super(options, client);
    }

    protected async request(query: string, signal?: AbortSignal): Promise<unknown> {
        const res = await this.client.get('https://serpapi.com/search.json', {
            params: { engine: 'google', q: query, api_key: this.apiKey, num: String(MAX_RESULTS) },
            signal,
        });
        return res.data;
    }

    protected parse(payload: unknown): SearchResult[] {
        const data = SerpApiPayload.parse(payload);
        return (data.organic_results ?? []).map(it => ({
            title: it.title ?? '',
            url: (it.link ?? '').trim(),
            snippet: it.snippet || it.snippet_highlighted_words?.[0] || '',
        }));
    }
}

const SerperPayload = z.object({
    organic: z.array(z.object({ title: Text, link: Text, snippet: Text })).nullish(),
});

/** Serper.dev Google API. */
export class SerperProvider extends HttpSearchProvider {
    readonly name = 'Serper';

    constructor(private readonly apiKey: string, options?: SearchHttpOptions, client?: AxiosInstance) {
        super(options, client);
    }

    protected async request(query: string, signal?: AbortSignal): Promise<unknown> {
        const res = await this.client.post('https://google.serper.dev/search',
            { q: query, num: MAX_RESULTS },
            { headers: { 'X-API-KEY': this.apiKey, 'Content-Type': 'application/json' }, signal },
        );
        return res.data;
    }

    protected parse(payload: unknown): SearchResult[] {
        const data = SerperPayload.parse(payload);
        return (data.organic ?? []).map(it => ({
            title: it.title ?? '',
            url: (it.link ?? '').trim(),
            snippet: it.snippet ?? '',
        }));
    }
}

export interface ProviderSettings {
    provider: ProviderId;
    googleCseApiKey?: string;
    googleCseCx?: string;
    serpApiKey?: string;
    serperApiKey?: string;
}

export class SearchFactory {
    /** Fails fast when the selected provider has no credentials. */
    static create(settings: ProviderSettings, options: SearchHttpOptions = DEFAULT_HTTP_OPTIONS): SearchProvider {
        switch (settings.provider) {
            case 'google_cse':
                if (!settings.googleCseApiKey || !settings.googleCseCx) {
                    throw new ProviderUnavailableError(
                        'GOOGLE_CSE_API_KEY and GOOGLE_CSE_CX required for SEARCH_PROVIDER=google_cse', settings.provider);
                }
                return new GoogleCseProvider(settings.googleCseApiKey, settings.googleCseCx, options);
            case 'serpapi':
                if (!settings.serpApiKey) {
                    throw new ProviderUnavailableError('SERPAPI_API_KEY missing while SEARCH_PROVIDER=serpapi', settings.provider);
                }
                return new SerpApiProvider(settings.serpApiKey, options);
            case 'serper':
                if (!settings.serperApiKey) {
                    throw new ProviderUnavailableError('SERPER_API_KEY missing while SEARCH_PROVIDER=serper', settings.provider);
                }
                return new SerperProvider(settings.serperApiKey, options);
        }
    }
}
