import { getDomain } from 'tldts';
import { StringUtils } from '../../utils/similarity';

// Social, directory and aggregator hosts that are never a company's own site
export const SOCIAL_HOSTS = new Set([
    'linkedin.com', 'facebook.com', 'instagram.com', 'x.com', 'twitter.com',
    'youtube.com', 'crunchbase.com', 'bloomberg.com', 'zoominfo.com',
    'manta.com', 'yelp.com', 'glassdoor.com', 'indeed.com', 'angel.co',
    'wikipedia.org', 'maps.google.com', 'google.com', 'goo.gl',
]);

// Scheduling, forms and ticketing hosts
export const BLACKLIST_SUBSTRINGS = ['eventbrite', 'hubspot', 'forms.gle', 'zoom.us'];

export const SOCIAL_HOST_PENALTY = -60;
export const BLACKLIST_PENALTY = -40;

export class Scorer {

    /**
     * Raw, unbounded score of one search result for a normalized company name.
     * Acceptance thresholds are calibrated against this scale, so keep the weights in step
     * with MIN_RESOLVER_SCORE.
     */
    static score(normalizedName: string, title: string, url: string, snippet: string): number {
        const titleLower = (title || '').toLowerCase();
        const snippetLower = (snippet || '').toLowerCase();
        const host = this.registrableDomain(url);
        const hostCore = host ? host.split('.')[0] : '';

        const simHost = StringUtils.tokenSetRatio(normalizedName, hostCore);
        const simTitle = StringUtils.tokenSetRatio(normalizedName, titleLower);
        const simSnippet = StringUtils.tokenSetRatio(normalizedName, snippetLower);

        let score = 0.7 * simHost + 0.3 * simTitle;
        if (titleLower.includes('official') || titleLower.includes('home')) {
            score += 5;
        }
        score += Math.min(8, simSnippet / 12);
        score += this.urlPenalty(url);
        return score;
    }

    static urlPenalty(url: string): number {
        const u = url.toLowerCase();
        const host = this.registrableDomain(url);
        if (host && SOCIAL_HOSTS.has(host)) return SOCIAL_HOST_PENALTY;
        if (BLACKLIST_SUBSTRINGS.some(x => u.includes(x))) return BLACKLIST_PENALTY;

        // Deep paths and query/fragment parts usually mean a non-homepage result
        const depth = (u.match(/\//g) || []).length - 2;
        const extras = (u.includes('?') ? 1 : 0) + (u.includes('#') ? 1 : 0);
        return 0 - depth * 4 - extras * 5;
    }

    /** "domain.suffix" per the public suffix list, ignoring subdomains; '' when there is none. */
    static registrableDomain(url: string): string {
        try {
            return getDomain(url) ?? '';
        } catch {
            return '';
        }
    }
}
