import type { Readable } from 'stream';
import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { LivenessResult } from '../../types';
import { errorMessage } from '../../utils/errors';
import { logger } from '../observability';

const REJECTED_SCHEMES = ['mailto:', 'tel:', 'javascript:', 'data:', 'about:'];

// Statuses servers often send to HEAD probes while the page itself is fine
export const AMBIGUOUS_STATUSES = new Set([400, 401, 403, 405, 500]);

const BROWSER_HEADERS = {
    'User-Agent': 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0 Safari/537.36',
};

export interface LinkValidatorOptions {
    /** Keep http:// links instead of rewriting them to https://. */
    allowHttp?: boolean;
}

const isLiveStatus = (status: number) => status >= 200 && status < 400;

/** follow-redirects records the last hop on the native response. */
function finalUrlOf(response: AxiosResponse, fallback: string): string {
    const request: unknown = response.request;
    if (typeof request === 'object' && request !== null && 'res' in request) {
        const res: unknown = request.res;
        if (typeof res === 'object' && res !== null && 'responseUrl' in res && typeof res.responseUrl === 'string') {
            return res.responseUrl;
        }
    }
    return fallback;
}

export class LinkValidator {
    private readonly client: AxiosInstance;

    constructor(private readonly options: LinkValidatorOptions = {}, client?: AxiosInstance) {
        this.client = client ?? axios.create({ headers: BROWSER_HEADERS, maxRedirects: 10 });
    }

    /**
     * Web URL or null. Adds a missing scheme, rewrites http to https unless allowed,
     * drops the fragment and leaves the rest of the text untouched.
     */
    normalize(rawUrl: string): string | null {
        const url = (rawUrl || '').trim();
        if (!url) return null;

        const lower = url.toLowerCase();
        if (REJECTED_SCHEMES.some(s => lower.startsWith(s))) return null;

        const withScheme = url.includes('://') ? url : `https://${url}`;
        let parsed: URL;
        try {
            parsed = new URL(withScheme);
        } catch {
            return null;
        }
        if ((parsed.protocol !== 'http:' && parsed.protocol !== 'https:') || !parsed.hostname) {
            return null;
        }

        let rest = withScheme.slice(withScheme.indexOf('://') + 3);
        const hashAt = rest.indexOf('#');
        if (hashAt >= 0) rest = rest.slice(0, hashAt);

        const scheme = parsed.protocol === 'http:' && !this.options.allowHttp ? 'https' : parsed.protocol.slice(0, -1);
        return `${scheme}://${rest}`;
    }

    /**
     * HEAD first; a streamed GET only for ambiguous HEAD statuses. Transport failures mean
     * dead, never an exception.
     */
    async checkLive(url: string, timeoutMs: number, signal?: AbortSignal): Promise<LivenessResult> {
        try {
            const head = await this.client.head(url, {
                timeout: timeoutMs,
                validateStatus: () => true,
                signal,
            });
            const headFinal = finalUrlOf(head, url);
            if (isLiveStatus(head.status)) {
                return { isLive: true, finalUrl: headFinal, statusCode: head.status };
            }

            if (AMBIGUOUS_STATUSES.has(head.status)) {
                const get = await this.client.get<Readable>(url, {
                    timeout: timeoutMs,
                    validateStatus: () => true,
                    responseType: 'stream',
                    signal,
                });
                // Only the status matters; never read the body
                get.data.destroy();
                if (isLiveStatus(get.status)) {
                    return { isLive: true, finalUrl: finalUrlOf(get, url), statusCode: get.status };
                }
            }

            return { isLive: false, finalUrl: headFinal, statusCode: head.status };
        } catch (e) {
            logger.debug(`[Validator] Liveness probe failed for ${url}`, { error: errorMessage(e) });
            return { isLive: false, finalUrl: url, statusCode: null };
        }
    }
}
