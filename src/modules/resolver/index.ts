import { ScoredCandidate, SearchProvider } from '../../types';
import { ResolutionCache } from '../cache/resolution-cache';
import { Normalizer } from '../normalizer';
import { Scorer } from '../scorer';
import { logger } from '../observability';

export const DEFAULT_MIN_SCORE = 35;

export interface ResolverOptions {
    /** Also search "{name} company" (one more provider call per uncached name). */
    extraQuery?: boolean;
    /** Log every scored candidate. */
    debug?: boolean;
}

/**
 * Picks the single best "official site" for a company name from search results.
 * Outcomes, negative ones included, are cached by raw name.
 */
export class WebsiteResolver {

    constructor(
        private readonly provider: SearchProvider,
        private readonly cache: ResolutionCache,
        private readonly options: ResolverOptions = {},
    ) { }

    /** Never rejects; provider failures degrade to `null`. */
    async resolve(name: string, minScore = DEFAULT_MIN_SCORE, signal?: AbortSignal): Promise<string | null> {
        if (!name) return null;

        const cached = this.cache.get(name);
        if (cached) {
            return cached.status === 'resolved' ? cached.url : null;
        }

        const normalized = Normalizer.normalizeCompany(name);
        const queries = [`${name} official site`];
        if (this.options.extraQuery) {
            queries.push(`${name} company`);
        }

        let best: ScoredCandidate | null = null;

        for (const query of queries) {
            const results = await this.provider.search(query, signal);
            for (const result of results) {
                if (!result.url) continue;
                const score = Scorer.score(normalized, result.title, result.url, result.snippet);
                if (this.options.debug) {
                    logger.debug(`[Resolver] ${name} | ${Scorer.registrableDomain(result.url)} | score=${score.toFixed(1)} | ${result.title}`);
                }
                if (best === null || score > best.score) {
                    best = { url: result.url, score };
                }
            }
        }

        // An aborted resolution saw partial results; it must not be remembered
        if (signal?.aborted) {
            logger.debug(`[Resolver] Resolution of "${name}" aborted, outcome discarded`);
            return null;
        }

        const url = best !== null && best.score >= minScore ? best.url : null;
        this.cache.put(name, url);
        return url;
    }
}
