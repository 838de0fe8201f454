import fs from 'fs';
import path from 'path';
import { createArrayCsvWriter } from 'csv-writer';
import { RowSink, SheetRow, SkippedDisposition } from '../../types';
import { logger } from '../observability';

export const CSV_HEADER = ['Name', 'Industry', 'Link'];

/** Appends accepted rows to a CSV file; the header is only written when the file is new. */
export class CsvRowSink implements RowSink {
    readonly persistent = true;
    private writer: ReturnType<typeof createArrayCsvWriter>;

    constructor(filePath: string) {
        const exists = fs.existsSync(filePath);
        if (!exists) fs.mkdirSync(path.dirname(filePath), { recursive: true });
        this.writer = createArrayCsvWriter({
            path: filePath,
            header: exists ? undefined : CSV_HEADER,
            append: exists,
        });
    }

    async appendRows(rows: SheetRow[]): Promise<void> {
        if (rows.length === 0) return;
        await this.writer.writeRecords(rows);
    }
}

const PREVIEW_ROWS = 25;
const PREVIEW_SKIPS = 20;

/** Keeps rows in memory and logs what would have been written. */
export class PreviewSink implements RowSink {
    readonly persistent = false;
    readonly rows: SheetRow[] = [];

    async appendRows(rows: SheetRow[]): Promise<void> {
        this.rows.push(...rows);
    }

    report(skipped: SkippedDisposition[]): void {
        logger.info(`--- Preview (first ${Math.min(PREVIEW_ROWS, this.rows.length)} rows that WOULD be written) ---`);
        for (const [name, industry, link] of this.rows.slice(0, PREVIEW_ROWS)) {
            logger.info(`Name: ${name}  |  Industry: ${industry}  |  Link: ${link}`);
        }
        if (this.rows.length === 0) {
            logger.info('(No rows passed filters / live-link checks.)');
        } else if (this.rows.length > PREVIEW_ROWS) {
            logger.info(`... and ${this.rows.length - PREVIEW_ROWS} more rows.`);
        }

        logger.info(`--- Skipped (first ${Math.min(PREVIEW_SKIPS, skipped.length)}) ---`);
        for (const s of skipped.slice(0, PREVIEW_SKIPS)) {
            logger.info(`- ${s.name} | ${s.url ?? ''} -> ${s.reason}: ${s.detail}`);
        }
        if (skipped.length > PREVIEW_SKIPS) {
            logger.info(`... and ${skipped.length - PREVIEW_SKIPS} more skipped rows.`);
        }
    }
}
