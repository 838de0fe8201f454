import fs from 'fs';
import path from 'path';
import { logger } from '../observability';

/** Stored in the cache file for names whose resolution found nothing. */
export const NO_RESULT = '';

export type CacheEntry =
    | { status: 'resolved'; url: string }
    | { status: 'no_result' };

/**
 * Name -> website mapping shared across runs.
 *
 * Keys are the exact raw names, so two spellings of one company are two entries.
 * The file is read once on construction and rewritten whole after every mutation;
 * two processes sharing one file can lose each other's updates.
 */
export class ResolutionCache {
    private entries = new Map<string, string>();

    constructor(private readonly filePath: string) {
        this.load();
    }

    get size(): number {
        return this.entries.size;
    }

    has(name: string): boolean {
        return this.entries.has(name);
    }

    get(name: string): CacheEntry | undefined {
        const value = this.entries.get(name);
        if (value === undefined) return undefined;
        return value === NO_RESULT ? { status: 'no_result' } : { status: 'resolved', url: value };
    }

    /** `null` records a negative result. */
    put(name: string, url: string | null): void {
        this.entries.set(name, url ?? NO_RESULT);
        this.save();
    }

    /** Forgets one key so the next resolution for it queries the provider again. */
    delete(name: string): boolean {
        const removed = this.entries.delete(name);
        if (removed) this.save();
        return removed;
    }

    private load(): void {
        if (!fs.existsSync(this.filePath)) return;

        try {
            const data: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
            if (typeof data !== 'object' || data === null || Array.isArray(data)) {
                logger.warn('[Cache] Cache file is not a JSON object, starting fresh', { path: this.filePath });
                return;
            }
            for (const [name, url] of Object.entries(data)) {
                if (typeof url === 'string') this.entries.set(name, url);
            }
            logger.info(`[Cache] Loaded ${this.entries.size} resolutions from disk`, { path: this.filePath });
        } catch (e) {
            logger.logError('[Cache] Cache file unreadable, starting fresh', e, { path: this.filePath });
            this.entries = new Map();
        }
    }

    // Best-effort: a failed write never interrupts resolution
    private save(): void {
        try {
            fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
            fs.writeFileSync(this.filePath, JSON.stringify(Object.fromEntries(this.entries)));
        } catch (e) {
            logger.logError('[Cache] Failed to save cache to disk', e, { path: this.filePath });
        }
    }
}
