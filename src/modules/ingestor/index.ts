import fs from 'fs';
import axios, { AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import { parse } from 'csv-parse';
import { CompanyRecord } from '../../types';
import { logger } from '../observability';

export const NAME_HEADERS = ['name', 'company', 'company_name', 'business', 'business_name', 'organization', 'organisation'];

// Link labels directories put next to (or instead of) the company name
export const IGNORE_LABELS = new Set([
    'more info', 'more information', 'learn more', 'view more', 'view details',
    'details', 'view profile', 'profile', 'website', 'visit website',
]);

export interface CompanySource {
    readonly key: string;
    companies(maxItems?: number): AsyncGenerator<CompanyRecord, void, undefined>;
}

/** Case-insensitive de-duplication and the optional cap, shared by every source. */
async function* uniqueNames(labels: AsyncIterable<string> | Iterable<string>, maxItems?: number): AsyncGenerator<CompanyRecord, void, undefined> {
    const seen = new Set<string>();
    let count = 0;
    for await (const raw of labels) {
        const label = raw.replace(/\s+/g, ' ').trim();
        if (label.length < 2) continue;
        if (IGNORE_LABELS.has(label.toLowerCase())) continue;

        const key = label.toLowerCase();
        if (seen.has(key)) continue;
        seen.add(key);

        yield { name: label, website: null };
        count++;
        if (maxItems && count >= maxItems) return;
    }
}

function mapHeaders(headers: string[]): string[] {
    return headers.map(h => h.toLowerCase().trim().replace(/[^a-z0-9]+/g, '_'));
}

/** Streams company names from one column of a CSV file. */
export class CsvCompanySource implements CompanySource {

    constructor(readonly key: string, private readonly filePath: string, private readonly column?: string) { }

    async *companies(maxItems?: number): AsyncGenerator<CompanyRecord, void, undefined> {
        yield* uniqueNames(this.names(), maxItems);
    }

    private async *names(): AsyncGenerator<string, void, undefined> {
        const parser = parse({
            columns: mapHeaders,
            trim: true,
            skip_empty_lines: true,
            relax_column_count: true,
        });
        // pipe() does not forward read errors; a missing file must reject the iteration
        const input = fs.createReadStream(this.filePath);
        input.on('error', e => parser.destroy(e));
        input.pipe(parser);

        let column: string | undefined;
        for await (const record of parser) {
            if (typeof record !== 'object' || record === null) continue;
            const row: Record<string, unknown> = record;
            column ??= this.pickColumn(Object.keys(row));
            const value = row[column];
            if (typeof value === 'string') yield value;
        }
    }

    private pickColumn(columns: string[]): string {
        const wanted = this.column ? mapHeaders([this.column])[0] : undefined;
        if (wanted && columns.includes(wanted)) return wanted;
        const known = NAME_HEADERS.find(h => columns.includes(h));
        if (known) return known;
        logger.warn(`[Source:${this.key}] No name column found, using "${columns[0]}"`);
        return columns[0];
    }
}

export interface DirectoryPageOptions {
    url: string;
    nameSelector?: string;
    fallbackSelectors?: string[];
}

/**
 * Company names from a static directory listing. The first selector that matches any
 * node wins; pages that only render with JavaScript yield nothing.
 */
export class DirectoryPageSource implements CompanySource {
    private readonly client: AxiosInstance;

    constructor(readonly key: string, private readonly options: DirectoryPageOptions, client?: AxiosInstance) {
        this.client = client ?? axios.create({ timeout: 60000, headers: { 'User-Agent': 'Mozilla/5.0' } });
    }

    async *companies(maxItems?: number): AsyncGenerator<CompanyRecord, void, undefined> {
        const res = await this.client.get<string>(this.options.url, { responseType: 'text' });
        yield* uniqueNames(this.extractLabels(res.data), maxItems);
    }

    extractLabels(html: string): string[] {
        const $ = cheerio.load(html);
        const selectors = [...new Set([this.options.nameSelector, ...(this.options.fallbackSelectors ?? [])])]
            .filter((s): s is string => !!s);

        for (const css of selectors) {
            const nodes = $(css);
            if (nodes.length === 0) continue;
            logger.debug(`[Source:${this.key}] ${nodes.length} name nodes via "${css}"`);
            return nodes.toArray().map(el => $(el).text());
        }

        logger.warn(`[Source:${this.key}] No selector matched on ${this.options.url}`);
        return [];
    }
}
