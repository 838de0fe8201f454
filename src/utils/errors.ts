import type { Disposition, SheetRow } from '../types';

/**
 * Error classes shared across the enricher.
 * Per-entity problems never surface as these; they become skip dispositions.
 */

export class EnricherError extends Error {
    constructor(message: string, public code: string, public context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class ConfigurationError extends EnricherError {
    constructor(message: string, public issues: string[] = []) {
        super(message, 'CONFIG_ERROR', { fatal: true, issues });
    }
}

export class ProviderUnavailableError extends EnricherError {
    constructor(message: string, provider: string) {
        super(message, 'PROVIDER_UNAVAILABLE', { fatal: true, provider });
    }
}

export class DeadlineExceededError extends EnricherError {
    constructor(public budgetMs: number, label?: string) {
        super(`Deadline of ${budgetMs}ms exceeded${label ? ` during ${label}` : ''}`, 'DEADLINE_EXCEEDED', { label });
    }
}

export class SinkFailureError extends EnricherError {
    constructor(
        message: string,
        public dispositions: Disposition[],
        public pendingRows: SheetRow[],
        public cause?: unknown,
    ) {
        super(message, 'SINK_FAILURE', { fatal: true, pending: pendingRows.length });
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
